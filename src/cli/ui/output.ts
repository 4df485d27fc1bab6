/**
 * Styled output helpers
 */

import { readFileSync } from "node:fs";
import * as p from "@clack/prompts";
import color from "picocolors";

export { color };

function readVersion(): string {
  // Same depth from src/cli/ui and dist/cli/ui
  const pkg: unknown = JSON.parse(
    readFileSync(new URL("../../../package.json", import.meta.url), "utf-8"),
  );
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export const VERSION = readVersion();

export const LOGO = String.raw`
 _                     _
| |__   ___  _ __ __ _| | _____  ___ _ __
| '_ \ / _ \| '__/ _' | |/ / _ \/ _ \ '_ \
| |_) | (_) | | | (_| |   <  __/  __/ |_) |
|_.__/ \___/|_|  \__, |_|\_\___|\___| .__/
                 |___/              |_|
`;

export const intro = (title: string) => p.intro(color.bgCyan(color.black(` ${title} `)));
export const outro = (message: string) => p.outro(color.green(message));
export const cancel = (message: string) => p.cancel(message);
export const note = (message: string, title?: string) => p.note(message, title);

export const info = (message: string) => p.log.info(message);
export const success = (message: string) => p.log.success(message);
export const warn = (message: string) => p.log.warn(message);
export const error = (message: string) => p.log.error(message);
export const step = (message: string) => p.log.step(message);
export const message = (message: string) => p.log.message(message);

export const spinner = p.spinner;
