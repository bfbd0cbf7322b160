/**
 * LaTeX special-character escaping.
 */

/** Substitutions for the ten LaTeX special characters. */
const LATEX_ESCAPES: Readonly<Record<string, string>> = {
  "&": "\\&",
  "%": "\\%",
  $: "\\$",
  "#": "\\#",
  _: "\\_",
  "{": "\\{",
  "}": "\\}",
  "~": "\\textasciitilde{}",
  "^": "\\^{}",
  "\\": "\\textbackslash{}",
};

const LATEX_SPECIALS = /[&%$#_{}~^\\]/g;

/**
 * Escape raw text for use in a LaTeX document body.
 *
 * All substitutions happen in a single pass over the input, so the braces and
 * backslashes introduced by one substitution are never seen by another.
 * Apply exactly once per raw segment.
 */
export function escapeLatex(text: string): string {
  return text.replace(LATEX_SPECIALS, (ch) => LATEX_ESCAPES[ch] ?? ch);
}
