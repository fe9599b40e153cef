/**
 * Zod schemas for configuration and command input
 */

import { z } from "zod";

export const IdentitySchema = z.object({
  name: z.string().trim().min(1),
  email: z.string().trim().regex(/^[^\s<>]+@[^\s<>]+$/, "must look like user@host"),
});

export const HostKeyCheckingSchema = z.enum(["yes", "accept-new", "no"]);

export const ConfigSchema = z.object({
  committer: IdentitySchema,
  /** Reuse clones between runs, one directory per remote */
  cacheDir: z.string().min(1).optional(),
  /** Refuse to overwrite a remote branch that moved since the fetch */
  lease: z.boolean(),
  /** Leave commits below the first change untouched */
  reuseUnchanged: z.boolean(),
  strictHostKeyChecking: HostKeyCheckingSchema,
});

/**
 * Shape of `.retcon.yml`; every key optional
 */
export const ConfigFileSchema = z.object({
  committer: IdentitySchema.partial().optional(),
  cacheDir: z.string().min(1).optional(),
  lease: z.boolean().optional(),
  reuseUnchanged: z.boolean().optional(),
  strictHostKeyChecking: HostKeyCheckingSchema.optional(),
}).strict();

export const CommitHashSchema = z.string().trim().regex(
  /^[0-9a-fA-F]{7,64}$/,
  "Commit must be a full or abbreviated (7+ characters) hex hash",
);

export const KeepSchema = z.coerce.number().int().min(1, "keep must be at least 1");

export const MaxSchema = z.coerce.number().int();

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;
