/**
 * YAML formatting with Prettier
 */

import * as prettier from "prettier";
import { stringify as stringifyYaml } from "yaml";

/**
 * Convert a JavaScript value to formatted YAML string
 */
export async function formatYaml(data: unknown): Promise<string> {
  const yaml = stringifyYaml(data, { lineWidth: 0 });

  const formatted = await prettier.format(yaml, {
    parser: "yaml",
    printWidth: 80,
  });

  return formatted;
}
