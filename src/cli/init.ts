/**
 * sinphase init: write a starter configuration. Refuses to overwrite an
 * existing file unless forced.
 */

import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname, resolve } from "path";
import { stringify } from "yaml";
import { configTemplate, DEFAULT_CONFIG_OUTPUT, type TemplateType } from "../config/templates.js";

export interface InitOptions {
  template?: TemplateType;
  output?: string | null;
  organization?: string | null;
  force?: boolean;
}

export function runInit(cwd: string, options: InitOptions = {}): number {
  const output = options.output ?? DEFAULT_CONFIG_OUTPUT;
  const abs = resolve(cwd, output);
  if (existsSync(abs) && options.force !== true) {
    console.error(`sinphase init: ${output} already exists (use --force to overwrite)`);
    return 1;
  }

  const doc = configTemplate(options.template ?? "basic", options.organization ?? undefined);
  const content = output.endsWith(".json") ? JSON.stringify(doc, null, 2) + "\n" : stringify(doc);
  try {
    mkdirSync(dirname(abs), { recursive: true });
    writeFileSync(abs, content, "utf8");
  } catch (err) {
    console.error(`sinphase init: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
  console.log(`sinphase init: configuration written to ${output}`);
  return 0;
}
