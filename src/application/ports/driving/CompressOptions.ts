/**
 * Opciones de una ejecución de compresión
 */
export interface CompressOptions {
  /** Directorio raíz del recorrido */
  rootPath: string;

  /** Ejecutable de Ghostscript */
  toolPath: string;

  /** Timeout por archivo en milisegundos; 0 lo desactiva */
  timeoutMs: number;

  /** Patrones de ignorado (sintaxis .gitignore) relativos a la raíz */
  ignorePatterns: string[];

  /** Solo listar los PDFs encontrados, sin modificarlos */
  dryRun: boolean;

  verboseLogging: boolean;
}
