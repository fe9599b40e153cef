/**
 * Generic editor utilities
 */

import { spawn } from "node:child_process";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { makeTempDir, removeDir } from "./fs.js";

export function editorCommand(env: NodeJS.ProcessEnv = process.env): string {
  return env.EDITOR || env.VISUAL || "vi";
}

/**
 * Open a file in the user's preferred editor and wait for it to close
 */
export async function openEditor(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<void> {
  // Split editor string to handle cases like "code --wait"
  const [editorCmd, ...editorArgs] = editorCommand(env).split(/\s+/);

  const code = await new Promise<number | null>((resolve, reject) => {
    const child = spawn(editorCmd, [...editorArgs, filePath], { stdio: "inherit", env });
    child.on("error", reject);
    child.on("exit", resolve);
  });

  if (code !== 0) {
    throw new Error(`Editor exited with code ${code}`);
  }
}

/**
 * Drop `#` comment lines and surrounding blank lines, as git does for
 * commit messages
 */
export function cleanMessage(text: string): string {
  return text
    .split("\n")
    .filter((line) => !line.startsWith("#"))
    .join("\n")
    .replace(/^\s*\n/, "")
    .trimEnd();
}

/**
 * Let the user edit a commit message; `hint` is shown as comments
 */
export async function editMessage(initial: string, hint: string[] = []): Promise<string> {
  const dir = await makeTempDir("git-retcon-edit");
  const file = join(dir, "COMMIT_EDITMSG");
  try {
    const comments = hint.map((line) => `# ${line}`.trimEnd()).join("\n");
    await writeFile(file, `${initial}\n\n${comments}\n`);
    await openEditor(file);
    return cleanMessage(await readFile(file, "utf8"));
  } finally {
    await removeDir(dir);
  }
}
