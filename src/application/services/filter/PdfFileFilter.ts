import ignore from "ignore";

const PDF_EXTENSION = ".pdf";

/**
 * Servicio para decidir qué archivos se envían a la herramienta de compresión
 */
export class PdfFileFilter {
  /**
   * Comparación del sufijo sin distinguir mayúsculas (`.pdf`, `.PDF`, `.Pdf`)
   */
  isPdf(filePath: string): boolean {
    return filePath.toLowerCase().endsWith(PDF_EXTENSION);
  }

  /**
   * Construye el manejador de ignorado a partir de los patrones del usuario
   * @returns undefined si no hay patrones
   */
  createIgnoreHandler(
    ignorePatterns: string[]
  ): ReturnType<typeof ignore> | undefined {
    const patterns = ignorePatterns.map((p) => p.trim()).filter(Boolean);
    if (patterns.length === 0) {
      return undefined;
    }
    return ignore().add(patterns);
  }
}
