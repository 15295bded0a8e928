#!/usr/bin/env node
import { ConsoleProgressReporter } from "../../secondary/reporting/ConsoleProgressReporter";
import { errorMessage } from "../../../shared/constants/compressionMessages";
import { CLI_MESSAGES } from "./constants/cliMessages";
import {
  CliCommand,
  ConfigurationError,
  resolveConfiguration,
} from "./configuration";
import { createContainer } from "./di/dependencyContainer";

export const EXIT_CODES = {
  OK: 0,
  FAILED: 1,
  INVALID_CONFIGURATION: 2,
} as const;

/**
 * Punto de entrada de la CLI
 * @returns Código de salida del proceso
 */
export async function main(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Promise<number> {
  const reporter = new ConsoleProgressReporter();

  let command: CliCommand;
  try {
    command = resolveConfiguration(argv, env, cwd);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) {
      throw error;
    }
    reporter.error(error.message);
    reporter.error(CLI_MESSAGES.USAGE);
    return EXIT_CODES.INVALID_CONFIGURATION;
  }

  if (command.kind === "help") {
    reporter.info(CLI_MESSAGES.USAGE);
    return EXIT_CODES.OK;
  }

  const { compressUseCase } = createContainer(command.options);
  const result = await compressUseCase.execute(command.options);
  return result.ok ? EXIT_CODES.OK : EXIT_CODES.FAILED;
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(CLI_MESSAGES.ERRORS.UNEXPECTED(errorMessage(error)));
      process.exitCode = EXIT_CODES.FAILED;
    }
  );
}
