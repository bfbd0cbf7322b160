/**
 * Configuration defaults and validation.
 */

import { InvalidConfigurationError } from "./errors.js";
import { DOCUMENT_CLASSES, FONT_SIZES } from "./types.js";
import type { Configuration, DocumentClass, FontSize } from "./types.js";

export const DEFAULT_CONFIG: Readonly<Configuration> = Object.freeze({
  docClass: "article",
  fontSize: "12pt",
  margins: "margin=1in",
  extraPackages: [],
  customPreamble: "",
});

function isDocumentClass(value: string): value is DocumentClass {
  return DOCUMENT_CLASSES.some((c) => c === value);
}

function isFontSize(value: string): value is FontSize {
  return FONT_SIZES.some((s) => s === value);
}

/**
 * Split a comma-separated package list ("tikz, multirow") into names.
 * Blank entries are dropped.
 */
export function parsePackageList(list: string | undefined): string[] {
  if (!list) return [];
  return list
    .split(",")
    .map((name) => name.trim())
    .filter(Boolean);
}

/**
 * Fill in defaults and validate enumerated fields.
 * Throws InvalidConfigurationError for an unknown document class or font size.
 */
export function resolveConfig(overrides: Partial<Configuration> = {}): Readonly<Configuration> {
  const docClass = overrides.docClass ?? DEFAULT_CONFIG.docClass;
  if (!isDocumentClass(docClass)) {
    throw new InvalidConfigurationError("docClass", docClass, DOCUMENT_CLASSES);
  }
  const fontSize = overrides.fontSize ?? DEFAULT_CONFIG.fontSize;
  if (!isFontSize(fontSize)) {
    throw new InvalidConfigurationError("fontSize", fontSize, FONT_SIZES);
  }

  const config: Configuration = {
    docClass,
    fontSize,
    margins: overrides.margins ?? DEFAULT_CONFIG.margins,
    extraPackages: Object.freeze([...(overrides.extraPackages ?? DEFAULT_CONFIG.extraPackages)]),
    customPreamble: overrides.customPreamble ?? DEFAULT_CONFIG.customPreamble,
  };
  if (overrides.title !== undefined) config.title = overrides.title;
  if (overrides.author !== undefined) config.author = overrides.author;

  return Object.freeze(config);
}
