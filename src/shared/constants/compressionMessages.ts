export const COMPRESSION_MESSAGES = {
  PROGRESS: {
    TRYING: (path: string) => `🟡 Trying to compress: ${path}`,
    COMPRESSED: (path: string) => `✅ Compressed: ${path}`,
    SKIPPED: (path: string) => `⚠️ Skipped (error or permission issue): ${path}`,
    SKIPPED_TEMP_EXISTS: (path: string, tempPath: string) =>
      `⚠️ Skipped (temporary file already exists: ${tempPath}): ${path}`,
    DRY_RUN: (path: string) => `🔍 Would compress: ${path}`,
    SUMMARY: (compressed: number, skipped: number, replaceFailed: number) =>
      `📊 Done: ${compressed} compressed, ${skipped} skipped, ${replaceFailed} failed to replace.`,
  },
  REASONS: {
    TEMP_EXISTS: (tempPath: string) =>
      `temporary file already exists: ${tempPath}`,
  },
  ERRORS: {
    ROOT_NOT_FOUND: (path: string) =>
      `Root path does not exist or is not accessible: ${path}`,
    TRAVERSAL_FAILED: (path: string, error: string) =>
      `Could not read directory tree under ${path}: ${error}`,
    REPLACE_FAILED: (path: string, error: string) =>
      `❌ Could not replace original with compressed copy: ${path} (${error})`,
    TOOL_UNAVAILABLE: (executable: string, error: string) =>
      `❌ Compression tool not available: ${executable} (${error})`,
    CLEANUP_FAILED: (path: string, error: string) =>
      `Could not remove temporary file ${path}: ${error}`,
    UNREADABLE_DIRECTORY: (path: string, error: string) =>
      `Skipping unreadable directory ${path}: ${error}`,
  },
} as const;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
