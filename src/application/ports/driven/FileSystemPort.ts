import ignore from "ignore";

/**
 * Puerto secundario para interactuar con el sistema de archivos
 */
export interface FileSystemPort {
  /**
   * Recorre `rootPath` recursivamente y devuelve los archivos regulares
   * aceptados por `matcher`.
   * @param rootPath Directorio raíz del recorrido
   * @param matcher Recibe la ruta relativa en formato POSIX
   * @param ig Patrones de ignorado aplicados a archivos y directorios
   * @returns Rutas relativas (POSIX) ordenadas
   * @throws Si el directorio raíz no se puede leer
   */
  findFiles(
    rootPath: string,
    matcher: (relativePath: string) => boolean,
    ig?: ReturnType<typeof ignore>
  ): Promise<string[]>;

  exists(path: string): Promise<boolean>;

  /**
   * Mueve `from` sobre `to`, reemplazando el destino si existe.
   * @throws Si el sistema de archivos rechaza el renombrado
   */
  rename(from: string, to: string): Promise<void>;

  /**
   * Elimina un archivo. Que no exista no es un error.
   */
  remove(path: string): Promise<void>;
}
