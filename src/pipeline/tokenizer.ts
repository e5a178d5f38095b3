/**
 * Lexer for the chain syntax.
 *
 *   pipeline := stage ('>' stage)*
 *   stage    := operation arg*
 *   arg      := literal | '%'
 *
 * Quoting follows the shell closely enough for file names and queries:
 * single quotes are fully literal, double quotes honour \" and \\, and a
 * backslash outside quotes escapes the next character. A quoted '>' or '%'
 * is an ordinary argument.
 */

import { CompositionError } from "./errors.js";

export const STAGE_SEPARATOR = ">";
export const INPUT_PLACEHOLDER = "%";

export type PipelineToken =
  | { readonly kind: "word"; readonly value: string; readonly quoted: boolean }
  | { readonly kind: "separator" };

export function isPlaceholder(token: PipelineToken): boolean {
  return token.kind === "word" && !token.quoted && token.value === INPUT_PLACEHOLDER;
}

/**
 * Split a pipeline string into words and stage separators.
 *
 * @throws CompositionError on an unterminated quote or a dangling backslash
 */
export function tokenizePipeline(text: string): PipelineToken[] {
  const tokens: PipelineToken[] = [];
  let word = "";
  let inWord = false;
  let quoted = false;
  let quote: "'" | '"' | null = null;

  const flush = (): void => {
    if (inWord) {
      tokens.push({ kind: "word", value: word, quoted });
    }
    word = "";
    inWord = false;
    quoted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    if (quote === "'") {
      if (ch === "'") quote = null;
      else word += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === "\\" && (text.charAt(i + 1) === '"' || text.charAt(i + 1) === "\\")) {
        word += text.charAt(++i);
      } else {
        word += ch;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
      quoted = true;
    } else if (ch === "\\") {
      if (i + 1 >= text.length) {
        throw new CompositionError("dangling backslash at end of pipeline");
      }
      word += text.charAt(++i);
      inWord = true;
      quoted = true;
    } else if (ch === STAGE_SEPARATOR) {
      flush();
      tokens.push({ kind: "separator" });
    } else if (/\s/.test(ch)) {
      flush();
    } else {
      word += ch;
      inWord = true;
    }
  }

  if (quote !== null) {
    throw new CompositionError(`unterminated ${quote === "'" ? "single" : "double"} quote`);
  }
  flush();
  return tokens;
}

/**
 * Tokens from an argument vector the shell already split. Only an element
 * that is exactly ">" separates stages.
 */
export function tokensFromArgv(argv: readonly string[]): PipelineToken[] {
  return argv.map((arg): PipelineToken =>
    arg === STAGE_SEPARATOR ? { kind: "separator" } : { kind: "word", value: arg, quoted: false }
  );
}
