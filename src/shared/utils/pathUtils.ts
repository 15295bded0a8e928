import * as path from "path";

export const COMPRESSED_SUFFIX = "_compressed.pdf";

export function toPosix(relative: string): string {
  return relative.split(path.sep).join("/");
}

/**
 * Ruta temporal junto al original: se quita la última extensión del nombre
 * y se añade `_compressed.pdf` (`docs/a.PDF` -> `docs/a_compressed.pdf`).
 */
export function toCompressedTempPath(filePath: string): string {
  const { dir, name } = path.parse(filePath);
  return path.join(dir, `${name}${COMPRESSED_SUFFIX}`);
}
