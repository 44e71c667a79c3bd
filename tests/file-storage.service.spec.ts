import { Test, TestingModule } from "@nestjs/testing";
import { existsSync } from "fs";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { FileStorageModule } from "../src/file-storage/file-storage.module";
import { FileStorageService } from "../src/file-storage/file-storage.service";
import {
  DestinationExistsError,
  FileStorageErrorCode,
  SourceNotFoundError,
  SourceOpenError,
  TemporaryFileError,
} from "../src/file-storage/file-storage.errors";

function readAll(stream: NodeJS.ReadableStream): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on("data", (chunk: Buffer) => chunks.push(chunk));
    stream.on("end", () => resolve(Buffer.concat(chunks)));
    stream.on("error", reject);
  });
}

function writeAndWait(
  stream: NodeJS.WritableStream,
  data: Buffer,
): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(data, (error) => (error ? reject(error) : resolve()));
  });
}

describe("FileStorageService", () => {
  let service: FileStorageService;
  let module: TestingModule;
  let workDir: string;

  beforeAll(async () => {
    module = await Test.createTestingModule({
      imports: [FileStorageModule],
    }).compile();

    service = module.get<FileStorageService>(FileStorageService);
  });

  afterAll(async () => {
    await module.close();
  });

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "file-storage-spec-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  describe("resolveDestinationPath", () => {
    it("should replace the image extension with .iso", () => {
      expect(service.resolveDestinationPath("disc.img")).toBe("disc.iso");
      expect(service.resolveDestinationPath("/images/game.v2/disc.img")).toBe(
        "/images/game.v2/disc.iso",
      );
    });

    it("should append .iso when the image has no extension", () => {
      expect(service.resolveDestinationPath("images.old/disc")).toBe(
        "images.old/disc.iso",
      );
    });

    it("should prefer an explicit output path", () => {
      expect(service.resolveDestinationPath("disc.img", "out/backup.iso")).toBe(
        "out/backup.iso",
      );
    });
  });

  describe("openSource", () => {
    it("should return the size and a stream over the file", async () => {
      const path = join(workDir, "disc.img");
      await writeFile(path, Buffer.from("raw image bytes"));

      const source = await service.openSource(path);

      expect(source.path).toBe(path);
      expect(source.size).toBe(15);
      expect((await readAll(source.stream)).toString()).toBe("raw image bytes");
    });

    it("should throw SourceNotFoundError for a missing file", async () => {
      const path = join(workDir, "missing.img");

      const error = await service.openSource(path).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SourceNotFoundError);
      expect(error).toMatchObject({
        code: FileStorageErrorCode.SOURCE_NOT_FOUND,
        path,
        message: `Couldn't find the file ${path}`,
      });
    });

    it("should throw SourceOpenError for a directory", async () => {
      await expect(service.openSource(workDir)).rejects.toThrow(SourceOpenError);
    });
  });

  describe("assertDestinationAvailable", () => {
    it("should accept a path that does not exist", async () => {
      await expect(
        service.assertDestinationAvailable(join(workDir, "disc.iso"), false),
      ).resolves.toBeUndefined();
    });

    it("should throw DestinationExistsError for an existing file", async () => {
      const path = join(workDir, "disc.iso");
      await writeFile(path, "old");

      const error = await service
        .assertDestinationAvailable(path, false)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DestinationExistsError);
      expect(error).toHaveProperty(
        "message",
        `${path} already exists, pass --force if you want to overwrite it.`,
      );
    });

    it("should accept an existing file when forced", async () => {
      const path = join(workDir, "disc.iso");
      await writeFile(path, "old");

      await expect(
        service.assertDestinationAvailable(path, true),
      ).resolves.toBeUndefined();
    });
  });

  describe("temporary destinations", () => {
    it("should create the temporary file next to the destination", async () => {
      const finalPath = join(workDir, "disc.iso");

      const temporary = await service.createTemporaryDestination(finalPath);

      expect(temporary.path.startsWith(join(workDir, ".disc.iso."))).toBe(true);
      expect(temporary.path.endsWith(".tmp")).toBe(true);
      expect(existsSync(temporary.path)).toBe(true);

      await service.discard(temporary);
    });

    it("should move committed output into place", async () => {
      const finalPath = join(workDir, "disc.iso");
      const temporary = await service.createTemporaryDestination(finalPath);
      await writeAndWait(temporary.stream, Buffer.alloc(4096, 0xab));

      await service.commit(temporary, finalPath);

      expect(await readFile(finalPath)).toEqual(Buffer.alloc(4096, 0xab));
      expect(await readdir(workDir)).toEqual(["disc.iso"]);
    });

    it("should replace an existing destination on commit", async () => {
      const finalPath = join(workDir, "disc.iso");
      await writeFile(finalPath, "previous contents");
      const temporary = await service.createTemporaryDestination(finalPath);
      await writeAndWait(temporary.stream, Buffer.from("new contents"));

      await service.commit(temporary, finalPath);

      expect((await readFile(finalPath)).toString()).toBe("new contents");
    });

    it("should delete discarded output", async () => {
      const finalPath = join(workDir, "disc.iso");
      const temporary = await service.createTemporaryDestination(finalPath);
      await writeAndWait(temporary.stream, Buffer.alloc(2048));

      await service.discard(temporary);

      expect(await readdir(workDir)).toEqual([]);
    });

    it("should tolerate discarding twice", async () => {
      const temporary = await service.createTemporaryDestination(
        join(workDir, "disc.iso"),
      );

      await service.discard(temporary);
      await expect(service.discard(temporary)).resolves.toBeUndefined();
    });

    it("should throw TemporaryFileError when the directory does not exist", async () => {
      const finalPath = join(workDir, "missing", "disc.iso");

      await expect(
        service.createTemporaryDestination(finalPath),
      ).rejects.toThrow(TemporaryFileError);
    });

    it("should clean up when the destination directory vanished before commit", async () => {
      const outputDir = join(workDir, "out");
      await mkdir(outputDir);
      const temporary = await service.createTemporaryDestination(
        join(outputDir, "disc.iso"),
      );
      await writeAndWait(temporary.stream, Buffer.alloc(16));

      const error = await service
        .commit(temporary, join(workDir, "gone", "disc.iso"))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TemporaryFileError);
      expect(await readdir(outputDir)).toEqual([]);
    });
  });
});
