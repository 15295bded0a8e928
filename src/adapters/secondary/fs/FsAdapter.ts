import * as fs from "fs";
import * as nodePath from "path";
import { FileSystemPort } from "../../../application/ports/driven/FileSystemPort";
import { ProgressReporter } from "../../../application/ports/driven/ProgressReporter";
import { toPosix } from "../../../shared/utils/pathUtils";
import {
  COMPRESSION_MESSAGES,
  errorMessage,
} from "../../../shared/constants/compressionMessages";
import pLimit from "p-limit";
import ignoreAdapterImport from "ignore";

const concurrencyLimit = pLimit(32);

/**
 * Adaptador para el sistema de archivos
 */
export class FsAdapter implements FileSystemPort {
  /**
   * @param logger Recibe los avisos de subdirectorios que no se pueden leer
   */
  constructor(private readonly logger?: ProgressReporter) {}

  async findFiles(
    rootPath: string,
    matcher: (relativePath: string) => boolean,
    ig?: ReturnType<typeof ignoreAdapterImport>
  ): Promise<string[]> {
    const list: string[] = [];
    await this.collectFilesRecursive(rootPath, "", list, matcher, ig);
    return list.sort();
  }

  private async collectFilesRecursive(
    currentPath: string,
    relPath: string,
    out: string[],
    matcher: (relativePath: string) => boolean,
    ig?: ReturnType<typeof ignoreAdapterImport>
  ): Promise<void> {
    let entries: fs.Dirent[];
    try {
      // Solo se limita la lectura; la recursión queda fuera del limitador
      entries = await concurrencyLimit(() =>
        fs.promises.readdir(currentPath, { withFileTypes: true })
      );
    } catch (error) {
      if (relPath === "") {
        throw error;
      }
      this.logger?.warn(
        COMPRESSION_MESSAGES.ERRORS.UNREADABLE_DIRECTORY(
          currentPath,
          errorMessage(error)
        )
      );
      return;
    }

    const subdirectories: Promise<void>[] = [];
    for (const entry of entries) {
      const childRel = toPosix(nodePath.join(relPath, entry.name));
      const ignorePath = entry.isDirectory() ? `${childRel}/` : childRel;
      // `ignore` lanza con nombres como "..." que no acepta como ruta relativa
      if (
        ig &&
        ignoreAdapterImport.isPathValid(ignorePath) &&
        ig.ignores(ignorePath)
      ) {
        continue;
      }

      if (entry.isDirectory()) {
        subdirectories.push(
          this.collectFilesRecursive(
            nodePath.join(currentPath, entry.name),
            childRel,
            out,
            matcher,
            ig
          )
        );
      } else if (entry.isFile() && matcher(childRel)) {
        out.push(childRel);
      }
    }
    await Promise.all(subdirectories);
  }

  async exists(p: string): Promise<boolean> {
    try {
      await fs.promises.access(p);
      return true;
    } catch {
      return false;
    }
  }

  async rename(from: string, to: string): Promise<void> {
    await fs.promises.rename(from, to);
  }

  async remove(filePath: string): Promise<void> {
    await fs.promises.rm(filePath, { force: true });
  }
}
