import { ProgressReporter } from "../../../application/ports/driven/ProgressReporter";

/**
 * Implementación de ProgressReporter que usa console.
 * Las líneas de progreso se imprimen tal cual, sin prefijos de nivel.
 */
export class ConsoleProgressReporter implements ProgressReporter {
  private readonly verbose: boolean;

  /**
   * @param verbose Si es true, muestra temporizadores y mensajes de depuración.
   */
  constructor(verbose: boolean = false) {
    this.verbose = verbose;
  }

  startOperation(label: string): void {
    if (this.verbose) {
      console.time(label);
    }
  }

  endOperation(label: string): void {
    if (this.verbose) {
      console.timeEnd(label);
    }
  }

  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(message: string, error?: unknown): void {
    if (error === undefined) {
      console.error(message);
    } else {
      console.error(message, error);
    }
  }

  debug(message: string, ...optionalParams: unknown[]): void {
    if (this.verbose) {
      console.debug(message, ...optionalParams);
    }
  }
}
