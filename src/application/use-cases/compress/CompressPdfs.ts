import * as path from "path";
import { CompressUseCase } from "../../ports/driving/CompressUseCase";
import { CompressOptions } from "../../ports/driving/CompressOptions";
import { CompressResult } from "../../ports/driving/CompressResult";
import { FileSystemPort } from "../../ports/driven/FileSystemPort";
import {
  CompressionToolPort,
  CompressionToolUnavailableError,
} from "../../ports/driven/CompressionToolPort";
import { ProgressReporter } from "../../ports/driven/ProgressReporter";
import { ConsoleProgressReporter } from "../../../adapters/secondary/reporting/ConsoleProgressReporter";
import { PdfFileFilter } from "../../services/filter/PdfFileFilter";
import { FileCompressorService } from "./services/FileCompressorService";
import {
  FileOutcome,
  summarizeOutcomes,
} from "../../../domain/model/FileOutcome";
import {
  COMPRESSION_MESSAGES,
  errorMessage,
} from "../../../shared/constants/compressionMessages";

export class CompressPdfs implements CompressUseCase {
  private readonly logger: ProgressReporter;
  private readonly pdfFilter = new PdfFileFilter();
  private readonly compressor: FileCompressorService;

  constructor(
    private readonly fsPort: FileSystemPort,
    tool: CompressionToolPort,
    logger?: ProgressReporter
  ) {
    this.logger = logger ?? new ConsoleProgressReporter(false);
    this.compressor = new FileCompressorService(fsPort, tool, this.logger);
  }

  async execute(options: CompressOptions): Promise<CompressResult> {
    this.logger.startOperation("CompressPdfs.execute");
    try {
      return await this.run(options);
    } finally {
      this.logger.endOperation("CompressPdfs.execute");
    }
  }

  private async run(options: CompressOptions): Promise<CompressResult> {
    const { rootPath } = options;
    this.logger.debug(`CompressPdfs: scanning ${rootPath}`);

    if (!(await this.fsPort.exists(rootPath))) {
      const error = COMPRESSION_MESSAGES.ERRORS.ROOT_NOT_FOUND(rootPath);
      this.logger.error(error);
      return { ok: false, error, outcomes: [] };
    }

    let relativePaths: string[];
    try {
      relativePaths = await this.fsPort.findFiles(
        rootPath,
        (relativePath) => this.pdfFilter.isPdf(relativePath),
        this.pdfFilter.createIgnoreHandler(options.ignorePatterns)
      );
    } catch (err) {
      const error = COMPRESSION_MESSAGES.ERRORS.TRAVERSAL_FAILED(
        rootPath,
        errorMessage(err)
      );
      this.logger.error(error);
      return { ok: false, error, outcomes: [] };
    }

    this.logger.debug(`CompressPdfs: found ${relativePaths.length} PDF files`);

    const outcomes: FileOutcome[] = [];
    for (const relativePath of relativePaths) {
      const filePath = path.join(rootPath, relativePath);
      if (options.dryRun) {
        outcomes.push(this.compressor.plan(filePath));
        continue;
      }
      try {
        outcomes.push(await this.compressor.compress(filePath));
      } catch (err) {
        if (!(err instanceof CompressionToolUnavailableError)) {
          throw err;
        }
        const error = COMPRESSION_MESSAGES.ERRORS.TOOL_UNAVAILABLE(
          err.executable,
          err.reason
        );
        this.logger.error(error);
        return { ok: false, error, outcomes };
      }
    }

    const summary = summarizeOutcomes(outcomes);
    if (outcomes.length > 0 && !options.dryRun) {
      this.logger.info(
        COMPRESSION_MESSAGES.PROGRESS.SUMMARY(
          summary.compressed,
          summary.skipped,
          summary["replace-failed"]
        )
      );
    }
    return { ok: true, outcomes, summary };
  }
}
