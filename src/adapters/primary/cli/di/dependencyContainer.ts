import { FsAdapter } from "../../../secondary/fs/FsAdapter";
import { GhostscriptAdapter } from "../../../secondary/ghostscript/GhostscriptAdapter";
import { ConsoleProgressReporter } from "../../../secondary/reporting/ConsoleProgressReporter";
import { CompressPdfs } from "../../../../application/use-cases/compress/CompressPdfs";
import { CompressOptions } from "../../../../application/ports/driving/CompressOptions";
import { CompressUseCase } from "../../../../application/ports/driving/CompressUseCase";
import { ProgressReporter } from "../../../../application/ports/driven/ProgressReporter";
import { CompressionToolPort } from "../../../../application/ports/driven/CompressionToolPort";

export interface Container {
  logger: ProgressReporter;
  fsAdapter: FsAdapter;
  compressionTool: CompressionToolPort;
  compressUseCase: CompressUseCase;
}

export function createContainer(options: CompressOptions): Container {
  const logger = new ConsoleProgressReporter(options.verboseLogging);
  const fsAdapter = new FsAdapter(logger);
  const compressionTool = new GhostscriptAdapter({
    executable: options.toolPath,
    timeoutMs: options.timeoutMs,
    logger,
  });

  const compressUseCase = new CompressPdfs(fsAdapter, compressionTool, logger);

  return {
    logger,
    fsAdapter,
    compressionTool,
    compressUseCase,
  };
}
