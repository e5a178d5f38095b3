/**
 * Script resolution: a path on disk to the command line that runs it.
 */

import { statSync } from "node:fs";
import { extname, resolve } from "node:path";
import { ResolutionError } from "../pipeline/index.js";

export interface ResolvedScript {
  /** Absolute path of the script file */
  readonly path: string;
  /** Executable to spawn: an interpreter, or the script itself */
  readonly command: string;
  /** Arguments placed before the script path */
  readonly prefixArgs: readonly string[];
}

export interface InterpreterOptions {
  /** Interpreter for .py files (default: python3) */
  python?: string;
  /** Node executable for .js/.mjs/.cjs/.ts files (default: the running one) */
  node?: string;
}

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
}

export function isScriptFile(path: string): boolean {
  try {
    return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
  } catch (err) {
    const code = errorCode(err);
    if (code === "ENOTDIR" || code === "ENAMETOOLONG") {
      return false;
    }
    throw err;
  }
}

/**
 * Command line for a script, chosen by file extension. Files with an
 * unknown extension are executed directly and must be executable.
 *
 * @throws ResolutionError if the path is not an existing regular file
 */
export function resolveScript(ref: string, options: InterpreterOptions = {}): ResolvedScript {
  const path = resolve(ref);
  if (!isScriptFile(path)) {
    throw new ResolutionError(`script not found: ${ref}`);
  }

  const node = options.node ?? process.execPath;
  switch (extname(path).toLowerCase()) {
    case ".py":
      return { path, command: options.python ?? "python3", prefixArgs: [] };
    case ".js":
    case ".mjs":
    case ".cjs":
      return { path, command: node, prefixArgs: [] };
    case ".ts":
      return { path, command: node, prefixArgs: ["--import", "tsx"] };
    case ".sh":
      return { path, command: "sh", prefixArgs: [] };
    default:
      return { path, command: path, prefixArgs: [] };
  }
}
