/**
 * Path formatter codes.
 *
 * A formatter code derives part of a resolved path:
 *
 * | code | result for `/a/b/c.geojson` |
 * |------|-----------------------------|
 * | `%F` | `c.geojson`                 |
 * | `%f` | `c`                         |
 * | `%P` | `/a/b/c.geojson`            |
 * | `%p` | `/a/b`                      |
 * | `%E` | `.geojson`                  |
 *
 * An empty result (for example `%E` on `/a/b/c`) is a valid value.
 *
 * @module
 */

import * as path from "node:path";
import { UnknownFormatterError } from "../errors/errors.js";

export const FormatterCode = {
  FILE_NAME: "%F",
  FILE_NAME_WITHOUT_EXTENSION: "%f",
  FULL_PATH: "%P",
  PARENT_FOLDER: "%p",
  EXTENSION: "%E",
} as const;

export type FormatterCode = (typeof FormatterCode)[keyof typeof FormatterCode];

const FORMATTERS: Record<FormatterCode, (p: string) => string> = {
  "%F": (p) => path.basename(p),
  "%f": (p) => path.basename(p, path.extname(p)),
  "%P": (p) => p,
  "%p": (p) => path.dirname(p),
  "%E": (p) => path.extname(p),
};

function isFormatterCode(code: string): code is FormatterCode {
  return Object.hasOwn(FORMATTERS, code);
}

/**
 * Applies a single formatter code to a path.
 *
 * @throws UnknownFormatterError for a code outside the fixed set
 */
export function applyFormatter(filePath: string, code: string): string {
  if (!isFormatterCode(code)) {
    throw new UnknownFormatterError(code);
  }
  return FORMATTERS[code](filePath);
}

/**
 * Replaces every `%X` code in a template with the formatted path.
 * `%%` produces a literal percent sign.
 *
 * @example
 * ```typescript
 * formatPathTemplate("%p/%f_clipped%E", "/data/roads.geojson");
 * // => "/data/roads_clipped.geojson"
 * ```
 */
export function formatPathTemplate(template: string, filePath: string): string {
  return template.replace(/%(.)/g, (_match, letter: string) =>
    letter === "%" ? "%" : applyFormatter(filePath, `%${letter}`),
  );
}

/**
 * Codes in `template` that {@link formatPathTemplate} would reject.
 */
export function unknownFormatterCodes(template: string): string[] {
  return [...template.matchAll(/%(.)/g)]
    .map((match) => `%${match[1]}`)
    .filter((code) => code !== "%%" && !isFormatterCode(code));
}
