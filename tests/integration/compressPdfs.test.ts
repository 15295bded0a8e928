import * as fs from "fs";
import * as os from "os";
import * as nodePath from "path";
import { CompressPdfs } from "../../src/application/use-cases/compress/CompressPdfs";
import { FsAdapter } from "../../src/adapters/secondary/fs/FsAdapter";
import { CompressionToolPort } from "../../src/application/ports/driven/CompressionToolPort";
import { ProgressReporter } from "../../src/application/ports/driven/ProgressReporter";
import { CompressOptions } from "../../src/application/ports/driving/CompressOptions";
import { ExitStatus } from "../../src/domain/model/ExitStatus";

type Behaviour = "succeed" | "fail" | "killed";

/**
 * Herramienta falsa: escribe una salida parcial o completa según el nombre
 * del archivo y devuelve el estado de salida correspondiente.
 */
class FakeCompressionTool implements CompressionToolPort {
  readonly executable = "fake-gs";
  readonly inputs: string[] = [];

  constructor(private readonly behaviourFor: (input: string) => Behaviour) {}

  async run(inputPath: string, outputPath: string): Promise<ExitStatus> {
    this.inputs.push(inputPath);
    const behaviour = this.behaviourFor(inputPath);
    if (behaviour === "succeed") {
      fs.writeFileSync(outputPath, "compressed");
      return { code: 0, signal: null };
    }
    fs.writeFileSync(outputPath, "partial");
    return behaviour === "killed"
      ? { code: null, signal: "SIGKILL" }
      : { code: 1, signal: null };
  }
}

describe("CompressPdfs with the real file system", () => {
  let root: string;
  let logger: jest.Mocked<ProgressReporter>;

  const at = (relativePath: string) => nodePath.join(root, relativePath);
  const write = (relativePath: string, content: string | Buffer) => {
    fs.mkdirSync(nodePath.dirname(at(relativePath)), { recursive: true });
    fs.writeFileSync(at(relativePath), content);
  };
  const options = (): CompressOptions => ({
    rootPath: root,
    toolPath: "fake-gs",
    timeoutMs: 0,
    ignorePatterns: [],
    dryRun: false,
    verboseLogging: false,
  });
  const infoLines = () => logger.info.mock.calls.map((call) => call[0]);

  beforeEach(() => {
    root = fs.mkdtempSync(nodePath.join(os.tmpdir(), "compress-pdfs-"));
    logger = {
      startOperation: jest.fn(),
      endOperation: jest.fn(),
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
    };
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  test("should replace a.pdf and leave b.PDF byte-identical", async () => {
    const original = Buffer.from([0x25, 0x50, 0x44, 0x46, 0x00, 0xff, 0x10]);
    write("a.pdf", "large original");
    write("b.PDF", original);
    const tool = new FakeCompressionTool((input) =>
      input.endsWith("a.pdf") ? "succeed" : "fail"
    );

    const result = await new CompressPdfs(new FsAdapter(), tool, logger).execute(
      options()
    );

    expect(result.ok).toBe(true);
    expect(fs.readFileSync(at("a.pdf"), "utf-8")).toBe("compressed");
    expect(fs.readFileSync(at("b.PDF")).equals(original)).toBe(true);
    expect(fs.existsSync(at("a_compressed.pdf"))).toBe(false);
    expect(fs.existsSync(at("b_compressed.pdf"))).toBe(false);
    expect(infoLines()).toEqual([
      `🟡 Trying to compress: ${at("a.pdf")}`,
      `✅ Compressed: ${at("a.pdf")}`,
      `🟡 Trying to compress: ${at("b.PDF")}`,
      `⚠️ Skipped (error or permission issue): ${at("b.PDF")}`,
      "📊 Done: 1 compressed, 1 skipped, 0 failed to replace.",
    ]);
  });

  test("should never touch or pass on files that are not PDFs", async () => {
    write("notes.txt", "keep me");
    const tool = new FakeCompressionTool(() => "succeed");

    const result = await new CompressPdfs(new FsAdapter(), tool, logger).execute(
      options()
    );

    expect(result.ok).toBe(true);
    expect(tool.inputs).toEqual([]);
    expect(logger.info).not.toHaveBeenCalled();
    expect(fs.readFileSync(at("notes.txt"), "utf-8")).toBe("keep me");
    expect(fs.readdirSync(root)).toEqual(["notes.txt"]);
  });

  test("should process nested PDFs", async () => {
    write("sub/doc.pdf", "nested original");
    const tool = new FakeCompressionTool(() => "succeed");

    await new CompressPdfs(new FsAdapter(), tool, logger).execute(options());

    expect(tool.inputs).toEqual([at("sub/doc.pdf")]);
    expect(fs.readFileSync(at("sub/doc.pdf"), "utf-8")).toBe("compressed");
    expect(fs.readdirSync(at("sub"))).toEqual(["doc.pdf"]);
  });

  test("should clean up after a killed run", async () => {
    write("scan.pdf", "untouched");
    const tool = new FakeCompressionTool(() => "killed");

    const result = await new CompressPdfs(new FsAdapter(), tool, logger).execute(
      options()
    );

    expect(result.ok && result.summary.skipped).toBe(1);
    expect(fs.readFileSync(at("scan.pdf"), "utf-8")).toBe("untouched");
    expect(fs.existsSync(at("scan_compressed.pdf"))).toBe(false);
    expect(infoLines()).toContain(
      `⚠️ Skipped (error or permission issue): ${at("scan.pdf")}`
    );
  });

  test("should leave ignored directories alone", async () => {
    write("keep/a.pdf", "one");
    write("archive/b.pdf", "two");
    const tool = new FakeCompressionTool(() => "succeed");

    await new CompressPdfs(new FsAdapter(), tool, logger).execute({
      ...options(),
      ignorePatterns: ["archive/"],
    });

    expect(tool.inputs).toEqual([at("keep/a.pdf")]);
    expect(fs.readFileSync(at("archive/b.pdf"), "utf-8")).toBe("two");
  });

  test("should keep a user file that already has the temp name", async () => {
    write("a.pdf", "original");
    write("a_compressed.pdf", "user copy");
    const tool = new FakeCompressionTool(() => "fail");

    const result = await new CompressPdfs(new FsAdapter(), tool, logger).execute(
      options()
    );

    expect(result.ok && result.summary.skipped).toBe(2);
    expect(tool.inputs).toEqual([at("a_compressed.pdf")]);
    expect(fs.readdirSync(root).sort()).toEqual(["a.pdf", "a_compressed.pdf"]);
    expect(fs.readFileSync(at("a.pdf"), "utf-8")).toBe("original");
    expect(fs.readFileSync(at("a_compressed.pdf"), "utf-8")).toBe("user copy");
    expect(infoLines()).toContain(
      `⚠️ Skipped (temporary file already exists: ${at("a_compressed.pdf")}): ${at("a.pdf")}`
    );
  });
});
