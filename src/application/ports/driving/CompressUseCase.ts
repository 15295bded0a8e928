import { CompressOptions } from "./CompressOptions";
import { CompressResult } from "./CompressResult";

/**
 * Puerto primario (interfaz) para el caso de uso de compresión
 */
export interface CompressUseCase {
  /**
   * Comprime en sitio todos los PDFs bajo `options.rootPath`
   * @returns Resultado de la operación
   */
  execute(options: CompressOptions): Promise<CompressResult>;
}
