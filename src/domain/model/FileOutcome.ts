export type FileOutcomeStatus =
  | "compressed"
  | "skipped"
  | "replace-failed"
  | "planned";

/**
 * Resultado del procesamiento de un único PDF
 */
export interface FileOutcome {
  /** Ruta del PDF original */
  path: string;

  /** Ruta temporal `<nombre>_compressed.pdf` usada durante el intento */
  tempPath: string;

  status: FileOutcomeStatus;

  /** Detalle del fallo cuando status no es "compressed" ni "planned" */
  reason?: string;
}

export type OutcomeSummary = Record<FileOutcomeStatus, number>;

export function summarizeOutcomes(outcomes: FileOutcome[]): OutcomeSummary {
  const summary: OutcomeSummary = {
    compressed: 0,
    skipped: 0,
    "replace-failed": 0,
    planned: 0,
  };
  for (const outcome of outcomes) {
    summary[outcome.status]++;
  }
  return summary;
}
