export const CLI_MESSAGES = {
  USAGE: [
    "Usage: compress-pdfs [root] [options]",
    "",
    "Compresses every *.pdf under root (default: current directory) in place with Ghostscript.",
    "",
    "Options:",
    "  --gs <path>          Ghostscript executable (default: gs, env PDF_COMPRESS_GS)",
    "  --timeout <ms>       Kill a run after this many milliseconds, 0 disables (env PDF_COMPRESS_TIMEOUT_MS)",
    "  --ignore <pattern>   Skip paths matching a .gitignore-style pattern, repeatable (env PDF_COMPRESS_IGNORE)",
    "  --dry-run            List the files that would be compressed",
    "  --verbose            Print timings and debug output (env PDF_COMPRESS_VERBOSE=1)",
    "  -h, --help           Show this help",
  ].join("\n"),
  ERRORS: {
    INVALID_TIMEOUT: (value: string) =>
      `Invalid timeout "${value}": expected a non-negative integer number of milliseconds`,
    TIMEOUT_TOO_LARGE: (value: string, max: number) =>
      `Invalid timeout "${value}": must be at most ${max} milliseconds`,
    TOO_MANY_ROOTS: (roots: readonly string[]) =>
      `Expected at most one root directory, got ${roots.length}: ${roots.join(", ")}`,
    INVALID_ARGUMENTS: (error: string) => `Invalid arguments: ${error}`,
    UNEXPECTED: (error: string) => `Unexpected error: ${error}`,
  },
} as const;
