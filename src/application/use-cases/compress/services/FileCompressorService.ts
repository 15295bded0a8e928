import { FileSystemPort } from "../../../ports/driven/FileSystemPort";
import {
  CompressionToolPort,
  CompressionToolUnavailableError,
} from "../../../ports/driven/CompressionToolPort";
import { ProgressReporter } from "../../../ports/driven/ProgressReporter";
import { FileOutcome } from "../../../../domain/model/FileOutcome";
import {
  ExitStatus,
  describeExitStatus,
  isSuccess,
} from "../../../../domain/model/ExitStatus";
import { toCompressedTempPath } from "../../../../shared/utils/pathUtils";
import {
  COMPRESSION_MESSAGES,
  errorMessage,
} from "../../../../shared/constants/compressionMessages";

/**
 * Comprime un único PDF: ejecuta la herramienta sobre una copia temporal y
 * reemplaza el original solo si terminó con éxito.
 */
export class FileCompressorService {
  constructor(
    private readonly fsPort: FileSystemPort,
    private readonly tool: CompressionToolPort,
    private readonly logger: ProgressReporter
  ) {}

  /**
   * @throws CompressionToolUnavailableError si la herramienta no se pudo lanzar
   */
  async compress(filePath: string): Promise<FileOutcome> {
    const tempPath = toCompressedTempPath(filePath);
    this.logger.info(COMPRESSION_MESSAGES.PROGRESS.TRYING(filePath));

    // Un archivo previo con el nombre temporal es del usuario: no se toca
    if (await this.fsPort.exists(tempPath)) {
      const reason = COMPRESSION_MESSAGES.REASONS.TEMP_EXISTS(tempPath);
      this.logger.info(
        COMPRESSION_MESSAGES.PROGRESS.SKIPPED_TEMP_EXISTS(filePath, tempPath)
      );
      return { path: filePath, tempPath, status: "skipped", reason };
    }

    let status: ExitStatus;
    try {
      status = await this.tool.run(filePath, tempPath);
    } catch (error) {
      await this.cleanup(tempPath);
      throw error instanceof CompressionToolUnavailableError
        ? error
        : new CompressionToolUnavailableError(
            this.tool.executable,
            errorMessage(error)
          );
    }

    if (!isSuccess(status)) {
      const reason = describeExitStatus(status);
      this.logger.debug(`FileCompressorService: ${filePath}: ${reason}`);
      await this.cleanup(tempPath);
      this.logger.info(COMPRESSION_MESSAGES.PROGRESS.SKIPPED(filePath));
      return { path: filePath, tempPath, status: "skipped", reason };
    }

    try {
      await this.fsPort.rename(tempPath, filePath);
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.error(
        COMPRESSION_MESSAGES.ERRORS.REPLACE_FAILED(filePath, reason)
      );
      await this.cleanup(tempPath);
      return { path: filePath, tempPath, status: "replace-failed", reason };
    }

    this.logger.info(COMPRESSION_MESSAGES.PROGRESS.COMPRESSED(filePath));
    return { path: filePath, tempPath, status: "compressed" };
  }

  plan(filePath: string): FileOutcome {
    this.logger.info(COMPRESSION_MESSAGES.PROGRESS.DRY_RUN(filePath));
    return {
      path: filePath,
      tempPath: toCompressedTempPath(filePath),
      status: "planned",
    };
  }

  // Si no se puede borrar, se avisa y el lote sigue
  private async cleanup(tempPath: string): Promise<void> {
    try {
      await this.fsPort.remove(tempPath);
    } catch (error) {
      this.logger.warn(
        COMPRESSION_MESSAGES.ERRORS.CLEANUP_FAILED(tempPath, errorMessage(error))
      );
    }
  }
}
