import * as cp from "child_process";
import {
  CompressionToolPort,
  CompressionToolUnavailableError,
} from "../../../application/ports/driven/CompressionToolPort";
import { ProgressReporter } from "../../../application/ports/driven/ProgressReporter";
import { ExitStatus } from "../../../domain/model/ExitStatus";

/** Mayor retardo que acepta setTimeout; por encima Node lo reduce a 1 ms */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface GhostscriptAdapterOptions {
  /** Ejecutable de Ghostscript, `gs` por defecto */
  executable?: string;

  /** Milisegundos antes de matar el proceso; 0 o ausente = sin límite */
  timeoutMs?: number;

  logger?: ProgressReporter;
}

/**
 * Ajustes fijos: pdfwrite, compatibilidad 1.4 y perfil /screen (máxima compresión)
 */
export const GHOSTSCRIPT_COMPRESSION_ARGS = [
  "-sDEVICE=pdfwrite",
  "-dCompatibilityLevel=1.4",
  "-dPDFSETTINGS=/screen",
  "-dNOPAUSE",
  "-dQUIET",
  "-dBATCH",
] as const;

export function buildGhostscriptArgs(
  inputPath: string,
  outputPath: string
): string[] {
  return [
    ...GHOSTSCRIPT_COMPRESSION_ARGS,
    `-sOutputFile=${outputPath}`,
    inputPath,
  ];
}

/**
 * Adaptador que ejecuta Ghostscript como subproceso
 */
export class GhostscriptAdapter implements CompressionToolPort {
  readonly executable: string;
  private readonly timeoutMs: number;
  private readonly logger?: ProgressReporter;

  constructor(options: GhostscriptAdapterOptions = {}) {
    this.executable = options.executable ?? "gs";
    this.timeoutMs = Math.min(options.timeoutMs ?? 0, MAX_TIMER_DELAY_MS);
    this.logger = options.logger;
  }

  run(inputPath: string, outputPath: string): Promise<ExitStatus> {
    const args = buildGhostscriptArgs(inputPath, outputPath);
    this.logger?.debug(
      `GhostscriptAdapter: ${this.executable} ${args.join(" ")}`
    );

    return new Promise<ExitStatus>((resolve, reject) => {
      const child = cp.spawn(this.executable, args, {
        stdio: ["ignore", "inherit", "inherit"],
      });

      let timedOut = false;
      const timer =
        this.timeoutMs > 0
          ? setTimeout(() => {
              timedOut = true;
              child.kill("SIGTERM");
            }, this.timeoutMs)
          : undefined;

      // Si el ejecutable no existe, 'error' llega antes que 'close'
      child.once("error", (error) => {
        clearTimeout(timer);
        reject(
          new CompressionToolUnavailableError(this.executable, error.message)
        );
      });

      child.once("close", (code, signal) => {
        clearTimeout(timer);
        resolve(timedOut ? { code, signal, timedOut } : { code, signal });
      });
    });
  }
}
