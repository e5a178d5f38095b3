/**
 * The for_each operation.
 *
 *   for_each [--fail-fast] [--concurrency K] [--pass stdin|args|env] [--keep-partial] [--] <script> [args...]
 *
 * Options come first; the first token that is not an option names the
 * script and everything after it is passed to the script untouched.
 */

import type { ForEachDefaults } from "../config/index.js";
import {
  isPassMode,
  resolveScript,
  type InterpreterOptions,
  type PassMode,
  type ResolvedScript,
  type ScriptRunner,
} from "../external/index.js";
import {
  OperationArgumentError,
  parsePositiveInt,
  type Operation,
  type OperationContext,
} from "../pipeline/index.js";
import { ForEachExecutor } from "./executor.js";

export interface ForEachArgs {
  readonly failFast: boolean;
  readonly concurrency: number;
  readonly passMode: PassMode;
  readonly keepPartial: boolean;
  readonly script: string;
  readonly scriptArgs: readonly string[];
}

export interface ForEachOperationOptions {
  defaults: ForEachDefaults;
  interpreters?: InterpreterOptions;
  createRunner(ctx: OperationContext): ScriptRunner;
}

function splitOption(token: string): [string, string | undefined] {
  const eq = token.indexOf("=");
  return eq === -1 ? [token, undefined] : [token.slice(0, eq), token.slice(eq + 1)];
}

/**
 * Parse for_each arguments over the configured defaults.
 *
 * @throws OperationArgumentError on unknown options, bad values or a missing script
 */
export function parseForEachArgs(args: readonly string[], defaults: ForEachDefaults): ForEachArgs {
  let failFast = defaults.failFast;
  let keepPartial = false;
  let concurrency = defaults.concurrency;
  let passMode = defaults.passMode;
  let i = 0;

  const valueOf = (flag: string, inline: string | undefined): string => {
    if (inline !== undefined) return inline;
    const value = args[++i];
    if (value === undefined) {
      throw new OperationArgumentError(`option ${flag} needs a value`);
    }
    return value;
  };

  for (; i < args.length; i++) {
    const token = args[i];
    if (token === undefined || !token.startsWith("--")) break;
    if (token === "--") {
      i++;
      break;
    }

    const [flag, inline] = splitOption(token);
    switch (flag) {
      case "--fail-fast":
        failFast = true;
        break;
      case "--no-fail-fast":
        failFast = false;
        break;
      case "--keep-partial":
        keepPartial = true;
        break;
      case "--concurrency":
        concurrency = parsePositiveInt(valueOf(flag, inline), "concurrency", concurrency);
        break;
      case "--pass": {
        const mode = valueOf(flag, inline);
        if (!isPassMode(mode)) {
          throw new OperationArgumentError(`--pass must be one of stdin, args, env; got: ${mode}`);
        }
        passMode = mode;
        break;
      }
      default:
        throw new OperationArgumentError(`unknown for_each option: ${flag}`);
    }
  }

  const script = args[i];
  if (script === undefined) {
    throw new OperationArgumentError("missing script: for_each needs a script to run per record");
  }

  return { failFast, concurrency, passMode, keepPartial, script, scriptArgs: args.slice(i + 1) };
}

export function createForEachOperation(options: ForEachOperationOptions): Operation {
  const prepare = (args: readonly string[]): { parsed: ForEachArgs; script: ResolvedScript } => {
    const parsed = parseForEachArgs(args, options.defaults);
    return { parsed, script: resolveScript(parsed.script, options.interpreters) };
  };

  return {
    name: "for_each",
    summary: "run a script once per input record and concatenate its outputs",
    usage: "for_each [--fail-fast] [--concurrency K] [--pass stdin|args|env] [--keep-partial] <script> [args...]",
    input: "required",
    validate(args) {
      prepare(args);
    },
    async run(args, input, ctx) {
      const { parsed, script } = prepare(args);
      const executor = new ForEachExecutor(options.createRunner(ctx), {
        failFast: parsed.failFast,
        concurrency: parsed.concurrency,
        passMode: parsed.passMode,
        keepPartial: parsed.keepPartial,
        logger: ctx.logger,
      });
      const result = await executor.run(input ?? [], script, parsed.scriptArgs, ctx.signal);
      return { output: result.output, status: result.exitCode, failures: result.failures };
    },
  };
}
