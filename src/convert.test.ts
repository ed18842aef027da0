import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "fs/promises";
import { existsSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { convertDataset } from "./convert";
import { AnnotationParseError, ConfigError } from "./errors";
import { Logger } from "./logger";

function createTestLogger() {
  return new Logger({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  });
}

let dir: string;
let input: string;
let output: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "convert-test-"));
  input = join(dir, "input");
  output = join(dir, "output");
  await mkdir(input);
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const standardDocument = {
  images: [
    { id: 1, file_name: "img1.jpg", width: 100, height: 100 },
    { id: 2, file_name: "img2.jpg", width: 200, height: 200 },
  ],
  annotations: [{ id: 1, image_id: 1, category_id: 3, bbox: [10, 10, 20, 20] }],
};

function writeJson(file: string, data: unknown) {
  return writeFile(join(input, file), JSON.stringify(data));
}

describe("flat output", () => {
  test("writes labels and classes next to each other", async () => {
    await writeJson("annotations.json", standardDocument);

    const summary = await convertDataset(
      { input, output, format: "standard" },
      createTestLogger()
    );

    expect(summary).toEqual({
      processedFiles: 1,
      totalImages: 2,
      totalAnnotations: 1,
      labelFiles: 2,
      trainImages: 0,
      valImages: 0,
      copiedImages: 0,
      missingImages: 0,
      classes: [3],
      classesFile: join(output, "classes.txt"),
    });
    expect((await readdir(output)).sort()).toEqual([
      "classes.txt",
      "img1.txt",
      "img2.txt",
    ]);
    expect(await readFile(join(output, "img1.txt"), "utf8")).toBe(
      "3 0.200000 0.200000 0.200000 0.200000\n"
    );
    expect(await readFile(join(output, "img2.txt"), "utf8")).toBe("");
    expect(await readFile(join(output, "classes.txt"), "utf8")).toBe(
      "class_3\n"
    );
  });

  test("reads the DAMM format by default", async () => {
    await writeJson("damm.json", {
      annotations: [
        {
          file_name: "frames/a.jpg",
          width: 200,
          height: 100,
          image_id: 0,
          annotations: [
            {
              bbox: [
                [20, 10],
                [60, 50],
              ],
              category_id: 1,
            },
          ],
        },
      ],
    });

    const summary = await convertDataset(
      { input, output, createClasses: false },
      createTestLogger()
    );

    expect(summary.classes).toEqual([1]);
    expect(summary.classesFile).toBeUndefined();
    expect(await readdir(output)).toEqual(["a.txt"]);
    expect(await readFile(join(output, "a.txt"), "utf8")).toBe(
      "1 0.200000 0.300000 0.200000 0.400000\n"
    );
  });

  test("reads only the listed annotation files", async () => {
    await writeJson("a.json", standardDocument);
    await writeJson("b.json", {
      images: [{ id: 1, file_name: "img3.jpg", width: 10, height: 10 }],
      annotations: [],
    });

    const summary = await convertDataset(
      {
        input,
        output,
        format: "standard",
        inputFiles: [join(input, "b.json")],
      },
      createTestLogger()
    );

    expect(summary.processedFiles).toBe(1);
    expect(await readdir(output)).toEqual(["img3.txt"]);
  });

  test("warns that data.yaml needs the YOLO layout", async () => {
    await writeJson("annotations.json", standardDocument);
    const logger = createTestLogger();

    const summary = await convertDataset(
      { input, output, format: "standard", dataYaml: true },
      logger
    );

    expect(summary.dataYamlFile).toBeUndefined();
    expect(existsSync(join(output, "data.yaml"))).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      "data.yaml is only written with the YOLO directory layout"
    );
  });

});

describe("YOLO layout", () => {
  test("lists the classes of missing images", async () => {
    await writeJson("annotations.json", {
      images: [
        { id: 1, file_name: "img1.jpg", width: 100, height: 100 },
        { id: 2, file_name: "img2.jpg", width: 100, height: 100 },
      ],
      annotations: [
        { id: 1, image_id: 1, category_id: 3, bbox: [10, 10, 20, 20] },
        { id: 2, image_id: 2, category_id: 7, bbox: [0, 0, 50, 50] },
      ],
    });
    await writeFile(join(input, "img2.jpg"), "jpg-bytes");

    const summary = await convertDataset(
      {
        input,
        output,
        format: "standard",
        yoloStructure: true,
        trainSplit: 1,
        dataYaml: true,
        seed: 1,
      },
      createTestLogger()
    );

    expect(summary.missingImages).toBe(1);
    expect(summary.labelFiles).toBe(1);
    expect(summary.classes).toEqual([3, 7]);
    expect(await readFile(join(output, "classes.txt"), "utf8")).toBe(
      "class_3\nclass_7\n"
    );
    expect(await readFile(join(output, "data.yaml"), "utf8")).toContain(
      "nc: 8 # Number of classes\n"
    );
    expect(await readdir(join(output, "train", "labels"))).toEqual([
      "img2.txt",
    ]);
  });

  test("skips images without a file", async () => {
    await writeJson("annotations.json", {
      images: [{ id: 1, file_name: "img1.jpg", width: 100, height: 100 }],
      annotations: [
        { id: 1, image_id: 1, category_id: 3, bbox: [10, 10, 20, 20] },
      ],
    });
    const logger = createTestLogger();

    const summary = await convertDataset(
      { input, output, format: "standard", yoloStructure: true, seed: 1 },
      logger
    );

    expect(summary).toEqual({
      processedFiles: 1,
      totalImages: 1,
      totalAnnotations: 0,
      labelFiles: 0,
      trainImages: 0,
      valImages: 0,
      copiedImages: 0,
      missingImages: 1,
      classes: [3],
      seed: 1,
      classesFile: join(output, "classes.txt"),
    });
    expect(await readFile(join(output, "classes.txt"), "utf8")).toBe(
      "class_3\n"
    );
    expect(logger.warn).toHaveBeenCalledWith("Image file not found: img1.jpg");
    expect(logger.warn).toHaveBeenCalledWith("Missing images: 1");
  });

  describe("with five images", () => {
    beforeEach(async () => {
      const images = [1, 2, 3, 4, 5].map((id) => ({
        id,
        file_name: `img${id}.jpg`,
        width: 10,
        height: 10,
      }));
      await writeJson("annotations.json", {
        images,
        annotations: images.map((image) => ({
          id: image.id,
          image_id: image.id,
          category_id: image.id % 2,
          bbox: [0, 0, 5, 5],
        })),
      });
      for (const image of images) {
        await writeFile(join(input, image.file_name), image.file_name);
      }
    });

    test("splits by the floored train share", async () => {
      const summary = await convertDataset(
        {
          input,
          output,
          format: "standard",
          yoloStructure: true,
          trainSplit: 0.5,
          seed: 42,
        },
        createTestLogger()
      );

      expect(summary.trainImages).toBe(2);
      expect(summary.valImages).toBe(3);
      expect(summary.copiedImages).toBe(5);
      expect(summary.labelFiles).toBe(5);
      expect(summary.classes).toEqual([0, 1]);
      expect(await readdir(join(output, "train", "images"))).toHaveLength(2);
      expect(await readdir(join(output, "val", "labels"))).toHaveLength(3);
    });

    test("repeats the split for the same seed", async () => {
      const options = {
        input,
        format: "standard" as const,
        yoloStructure: true,
        seed: 7,
      };
      await convertDataset(
        { ...options, output: join(dir, "first") },
        createTestLogger()
      );
      await convertDataset(
        { ...options, output: join(dir, "second") },
        createTestLogger()
      );

      for (const group of ["train", "val"]) {
        expect(
          (await readdir(join(dir, "second", group, "images"))).sort()
        ).toEqual((await readdir(join(dir, "first", group, "images"))).sort());
      }
    });

    test("writes data.yaml", async () => {
      const summary = await convertDataset(
        {
          input,
          output,
          format: "standard",
          yoloStructure: true,
          dataYaml: true,
          seed: 3,
        },
        createTestLogger()
      );

      expect(summary.dataYamlFile).toBe(join(output, "data.yaml"));
      expect(await readFile(join(output, "data.yaml"), "utf8")).toBe(
        "train: train/images\n" +
          "val: val/images\n" +
          "\n" +
          "nc: 2 # Number of classes\n" +
          "# Class names\n" +
          "names:\n" +
          "  0: class_0\n" +
          "  1: class_1\n"
      );
    });
  });
});

describe("failures", () => {
  test("rejects a train split above 1", async () => {
    await expect(
      convertDataset({ input, output, trainSplit: 1.5 }, createTestLogger())
    ).rejects.toBeInstanceOf(ConfigError);
  });

  test("rejects a missing input directory", async () => {
    const missing = join(dir, "missing");

    await expect(
      convertDataset({ input: missing, output }, createTestLogger())
    ).rejects.toThrow(`Input directory does not exist: ${missing}`);
  });

  test("rejects an input without annotation files", async () => {
    await writeFile(join(input, "img1.jpg"), "");

    await expect(
      convertDataset({ input, output }, createTestLogger())
    ).rejects.toThrow(`No annotation files (*.json) found in ${input}`);
  });

  test("names the file that failed to parse", async () => {
    await writeFile(join(input, "bad.json"), "not json");

    const error = await convertDataset(
      { input, output, format: "standard" },
      createTestLogger()
    ).catch((error: unknown) => error);

    expect(error).toBeInstanceOf(AnnotationParseError);
    if (!(error instanceof AnnotationParseError)) return;
    expect(error.filePath).toBe(join(input, "bad.json"));
  });
});
