export { CompressPdfs } from "./application/use-cases/compress/CompressPdfs";
export { FileCompressorService } from "./application/use-cases/compress/services/FileCompressorService";
export { PdfFileFilter } from "./application/services/filter/PdfFileFilter";
export type { CompressUseCase } from "./application/ports/driving/CompressUseCase";
export type { CompressOptions } from "./application/ports/driving/CompressOptions";
export type { CompressResult } from "./application/ports/driving/CompressResult";
export type { FileSystemPort } from "./application/ports/driven/FileSystemPort";
export type { ProgressReporter } from "./application/ports/driven/ProgressReporter";
export type { CompressionToolPort } from "./application/ports/driven/CompressionToolPort";
export { CompressionToolUnavailableError } from "./application/ports/driven/CompressionToolPort";
export { FsAdapter } from "./adapters/secondary/fs/FsAdapter";
export type { GhostscriptAdapterOptions } from "./adapters/secondary/ghostscript/GhostscriptAdapter";
export {
  GhostscriptAdapter,
  buildGhostscriptArgs,
} from "./adapters/secondary/ghostscript/GhostscriptAdapter";
export { ConsoleProgressReporter } from "./adapters/secondary/reporting/ConsoleProgressReporter";
export type { ExitStatus } from "./domain/model/ExitStatus";
export { describeExitStatus, isSuccess } from "./domain/model/ExitStatus";
export type {
  FileOutcome,
  FileOutcomeStatus,
} from "./domain/model/FileOutcome";
export { summarizeOutcomes } from "./domain/model/FileOutcome";
export { toCompressedTempPath } from "./shared/utils/pathUtils";
export { main } from "./adapters/primary/cli/main";
