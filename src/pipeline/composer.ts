/**
 * Pipeline composer: tokens to an ordered Stage sequence.
 *
 * Pure transformation. Nothing is resolved or executed here, so a pipeline
 * with bad syntax is rejected before any operation can have a side effect.
 */

import { CompositionError } from "./errors.js";
import {
  INPUT_PLACEHOLDER,
  isPlaceholder,
  tokenizePipeline,
  tokensFromArgv,
  type PipelineToken,
} from "./tokenizer.js";
import type { Stage } from "./types.js";

type WordToken = Extract<PipelineToken, { kind: "word" }>;

function splitSegments(tokens: readonly PipelineToken[]): WordToken[][] {
  const segments: WordToken[][] = [[]];
  for (const token of tokens) {
    if (token.kind === "separator") {
      segments.push([]);
    } else {
      segments[segments.length - 1]?.push(token);
    }
  }
  return segments;
}

function composeStage(segment: readonly WordToken[], index: number): Stage {
  const [head, ...rest] = segment;
  if (head === undefined) {
    throw new CompositionError(
      index === 0 ? "pipeline starts with '>'" : `stage ${index} is empty (misplaced '>')`,
      { stageIndex: index }
    );
  }

  if (isPlaceholder(head)) {
    throw new CompositionError(
      `stage ${index} starts with '${INPUT_PLACEHOLDER}': expected an operation name`,
      { stageIndex: index }
    );
  }

  const placeholders = rest.filter(isPlaceholder).length;
  if (placeholders > 1) {
    throw new CompositionError(
      `'${INPUT_PLACEHOLDER}' appears ${placeholders} times; a stage takes at most one input`,
      { stageIndex: index, operation: head.value }
    );
  }
  if (placeholders === 1 && index === 0) {
    throw new CompositionError(
      `'${INPUT_PLACEHOLDER}' in the first stage has no preceding stage to bind to`,
      { stageIndex: index, operation: head.value }
    );
  }

  return Object.freeze({
    index,
    operation: head.value,
    args: Object.freeze(rest.filter((token) => !isPlaceholder(token)).map((token) => token.value)),
    usesPrevious: placeholders === 1,
  });
}

/**
 * Build the stage sequence. One stage per '>'-separated segment.
 *
 * @throws CompositionError for an empty pipeline, an empty segment, a
 *   segment starting with '%', repeated '%', or '%' in the first stage
 */
export function composePipeline(tokens: readonly PipelineToken[]): readonly Stage[] {
  if (tokens.length === 0) {
    throw new CompositionError("empty pipeline");
  }
  const segments = splitSegments(tokens);
  if (segments.length > 1 && segments[segments.length - 1]?.length === 0) {
    throw new CompositionError("pipeline ends with '>'", { stageIndex: segments.length - 1 });
  }
  return Object.freeze(segments.map((segment, index) => composeStage(segment, index)));
}

/**
 * Parse a pipeline string such as
 * `search_attachments --query X > save_attachments % > for_each % process.py`.
 */
export function parsePipeline(text: string): readonly Stage[] {
  return composePipeline(tokenizePipeline(text));
}

/**
 * Compose from an argument vector where ">" elements separate stages.
 */
export function parsePipelineArgv(argv: readonly string[]): readonly Stage[] {
  return composePipeline(tokensFromArgv(argv));
}
