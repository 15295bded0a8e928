import * as path from "path";
import { parseArgs } from "util";
import { CompressOptions } from "../../../application/ports/driving/CompressOptions";
import { errorMessage } from "../../../shared/constants/compressionMessages";
import { CLI_MESSAGES } from "./constants/cliMessages";

export const ENV_VARS = {
  ROOT: "PDF_COMPRESS_ROOT",
  GS: "PDF_COMPRESS_GS",
  TIMEOUT_MS: "PDF_COMPRESS_TIMEOUT_MS",
  IGNORE: "PDF_COMPRESS_IGNORE",
  VERBOSE: "PDF_COMPRESS_VERBOSE",
} as const;

export const DEFAULT_TOOL_PATH = "gs";

/** Mayor retardo que acepta setTimeout (2^31 - 1 ms) */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export type CliCommand =
  | { kind: "help" }
  | { kind: "run"; options: CompressOptions };

/**
 * Resuelve las opciones de la línea de comandos.
 * Prioridad: argumento > variable de entorno > valor por defecto.
 * @param argv Argumentos sin `node` ni el script
 * @param cwd Base para resolver una raíz relativa
 * @throws ConfigurationError si algún valor no es válido
 */
export function resolveConfiguration(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  cwd: string
): CliCommand {
  const { values, positionals } = parseCliArgs(argv);
  if (values.help) {
    return { kind: "help" };
  }
  if (positionals.length > 1) {
    throw new ConfigurationError(
      CLI_MESSAGES.ERRORS.TOO_MANY_ROOTS(positionals)
    );
  }

  const rootArg = positionals[0] ?? nonEmpty(env[ENV_VARS.ROOT]) ?? ".";

  return {
    kind: "run",
    options: {
      rootPath: path.resolve(cwd, rootArg),
      toolPath: values.gs ?? nonEmpty(env[ENV_VARS.GS]) ?? DEFAULT_TOOL_PATH,
      timeoutMs: parseTimeout(
        values.timeout ?? nonEmpty(env[ENV_VARS.TIMEOUT_MS])
      ),
      ignorePatterns: values.ignore ?? splitPatterns(env[ENV_VARS.IGNORE]),
      dryRun: values["dry-run"] ?? false,
      verboseLogging: values.verbose ?? isTruthy(env[ENV_VARS.VERBOSE]),
    },
  };
}

function parseCliArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        gs: { type: "string" },
        timeout: { type: "string" },
        ignore: { type: "string", multiple: true },
        "dry-run": { type: "boolean" },
        verbose: { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error) {
    throw new ConfigurationError(
      CLI_MESSAGES.ERRORS.INVALID_ARGUMENTS(errorMessage(error))
    );
  }
}

function parseTimeout(raw: string | undefined): number {
  if (raw === undefined) {
    return 0;
  }
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigurationError(CLI_MESSAGES.ERRORS.INVALID_TIMEOUT(raw));
  }
  const timeoutMs = Number(trimmed);
  if (timeoutMs > MAX_TIMEOUT_MS) {
    throw new ConfigurationError(
      CLI_MESSAGES.ERRORS.TIMEOUT_TOO_LARGE(raw, MAX_TIMEOUT_MS)
    );
  }
  return timeoutMs;
}

function splitPatterns(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(",")
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== "" ? value : undefined;
}

function isTruthy(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}
