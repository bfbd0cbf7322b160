/**
 * LaTeX preamble generation.
 */

import type { Configuration } from "../types.js";
import { escapeLatex } from "./escape.js";

/** Packages every generated document loads, in load order. */
export const BASELINE_PACKAGES = [
  "graphicx",
  "hyperref",
  "amsmath",
  "listings",
  "xcolor",
  "booktabs",
  "float",
] as const;

/** Default style for lstlisting environments. */
const LISTINGS_STYLE = String.raw`\lstset{
  basicstyle=\ttfamily\small,
  breaklines=true,
  frame=single,
  backgroundcolor=\color{gray!10},
  keywordstyle=\color{blue},
  commentstyle=\color{green!50!black},
  stringstyle=\color{red}
}`;

const DEFAULT_AUTHOR = "Auto-Generated";

/**
 * Baseline packages followed by the extra packages in the order supplied.
 * Extras are trimmed and de-duplicated; blanks, baseline names and geometry
 * (loaded by the margins directive) are skipped.
 */
export function resolvePackages(extraPackages: readonly string[]): string[] {
  const packages: string[] = [...BASELINE_PACKAGES];
  const seen = new Set<string>([...packages, "geometry"]);
  for (const raw of extraPackages) {
    const name = raw.trim();
    if (!name || seen.has(name)) continue;
    seen.add(name);
    packages.push(name);
  }
  return packages;
}

/** Build the document preamble: class, geometry, packages, listings style, title block, custom text. */
export function buildPreamble(config: Readonly<Configuration>): string {
  const margins = config.margins.trim();
  const lines = [
    `\\documentclass[${config.fontSize}]{${config.docClass}}`,
    margins ? `\\usepackage[${margins}]{geometry}` : "\\usepackage{geometry}",
    ...resolvePackages(config.extraPackages).map((pkg) => `\\usepackage{${pkg}}`),
    LISTINGS_STYLE,
  ];

  if (config.title !== undefined) {
    lines.push(`\\title{${escapeLatex(config.title)}}`);
    lines.push(`\\author{${escapeLatex(config.author ?? DEFAULT_AUTHOR)}}`);
    lines.push("\\date{\\today}");
  }

  if (config.customPreamble) {
    lines.push(config.customPreamble.replace(/\n+$/, ""));
  }

  return lines.join("\n") + "\n";
}
