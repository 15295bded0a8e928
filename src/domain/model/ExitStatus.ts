/**
 * Estado de salida de un proceso externo
 */
export interface ExitStatus {
  /** Código de salida, null si el proceso terminó por una señal */
  code: number | null;

  /** Señal que terminó el proceso (p. ej. "SIGTERM") */
  signal: NodeJS.Signals | null;

  /** true si el proceso se mató por superar el timeout configurado */
  timedOut?: boolean;
}

export function isSuccess(status: ExitStatus): boolean {
  return status.code === 0;
}

export function describeExitStatus(status: ExitStatus): string {
  if (status.timedOut) {
    return `timed out (${status.signal ?? "killed"})`;
  }
  if (status.signal !== null) {
    return `killed by ${status.signal}`;
  }
  return `exit code ${status.code ?? "unknown"}`;
}
