import { ExitStatus } from "../../../domain/model/ExitStatus";

/**
 * Puerto secundario para la herramienta externa que reescribe el PDF
 */
export interface CompressionToolPort {
  /** Ejecutable usado, para los mensajes */
  readonly executable: string;

  /**
   * Comprime `inputPath` escribiendo el resultado en `outputPath`.
   * Los fallos del proceso llegan en el `ExitStatus`, no como excepción.
   * @throws CompressionToolUnavailableError si el proceso no se pudo lanzar
   */
  run(inputPath: string, outputPath: string): Promise<ExitStatus>;
}

export class CompressionToolUnavailableError extends Error {
  constructor(
    readonly executable: string,
    readonly reason: string
  ) {
    super(`Compression tool not available: ${executable} (${reason})`);
    this.name = "CompressionToolUnavailableError";
  }
}
