import { FileOutcome, OutcomeSummary } from "../../../domain/model/FileOutcome";

/**
 * Representa el resultado de una ejecución completa
 */
export type CompressResult =
  | {
      ok: true;
      outcomes: FileOutcome[];
      summary: OutcomeSummary;
    }
  | {
      ok: false;
      /** Mensaje de error; el lote no llegó a completarse */
      error: string;
      /** Archivos procesados antes del fallo */
      outcomes: FileOutcome[];
    };
