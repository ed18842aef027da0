import { readFile } from "fs/promises";
import type { ZodType, ZodTypeDef } from "zod";

import type {
  AnnotationFormat,
  CornerBox,
  UnifiedAnnotation,
  UnifiedImage,
} from "./dataset";
import { AnnotationParseError, DatasetIoError } from "./errors";
import { createConsoleLogger, Logger } from "./logger";
import type { CocoAnnotation, CocoImage } from "./schema";
import {
  cocoDatasetSchema,
  dammDatasetSchema,
  formatIssues,
} from "./schema";

function parseJson<T>(
  format: AnnotationFormat,
  schema: ZodType<T, ZodTypeDef, unknown>,
  content: string
): T {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new AnnotationParseError(
      `Invalid JSON in ${format} annotation file: ${
        error instanceof Error ? error.message : String(error)
      }`,
      format
    );
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    throw new AnnotationParseError(
      `Invalid ${format} annotation file: ${formatIssues(
        result.error.issues
      )}`,
      format,
      result.error.issues
    );
  }
  return result.data;
}

// ---------------- standard (COCO) ----------------

/** COCO [x, y, width, height] to [x1, y1, x2, y2] */
export function cocoBboxToCorners(
  bbox: [number, number, number, number]
): CornerBox {
  const [x, y, width, height] = bbox;
  return [x, y, x + width, y + height];
}

/**
 * Images come out in the order of the `images` list. A repeated image id
 * keeps its first position and its last record. Annotations are grouped by
 * `image_id`; those pointing to an undeclared image are dropped.
 */
export function parseStandardDataset(content: string): UnifiedImage[] {
  const { images, annotations } = parseJson(
    "standard",
    cocoDatasetSchema,
    content
  );

  const image_map = new Map<number, CocoImage>();
  for (const image of images) {
    image_map.set(image.id, image);
  }

  const annotations_by_image = new Map<number, CocoAnnotation[]>();
  for (const annotation of annotations) {
    let list = annotations_by_image.get(annotation.image_id);
    if (!list) {
      list = [];
      annotations_by_image.set(annotation.image_id, list);
    }
    list.push(annotation);
  }

  const unified_images: UnifiedImage[] = [];
  for (const [image_id, image] of image_map) {
    const unified_annotations: UnifiedAnnotation[] = (
      annotations_by_image.get(image_id) ?? []
    ).map((annotation) => ({
      bbox: cocoBboxToCorners(annotation.bbox),
      category_id: annotation.category_id,
    }));
    unified_images.push({
      file_name: image.file_name,
      width: image.width,
      height: image.height,
      annotations: unified_annotations,
    });
  }
  return unified_images;
}

// ---------------- DAMM ----------------

/** one unified image per record of the top-level `annotations` list */
export function parseDammDataset(content: string): UnifiedImage[] {
  const dataset = parseJson("damm", dammDatasetSchema, content);

  return dataset.annotations.map(
    (image): UnifiedImage => ({
      file_name: image.file_name,
      width: image.width,
      height: image.height,
      annotations: image.annotations.map(
        ({ bbox, category_id }): UnifiedAnnotation => {
          const [[x1, y1], [x2, y2]] = bbox;
          return { bbox: [x1, y1, x2, y2], category_id };
        }
      ),
    })
  );
}

export function parseAnnotationContent(
  format: AnnotationFormat,
  content: string
): UnifiedImage[] {
  switch (format) {
    case "standard":
      return parseStandardDataset(content);
    case "damm":
      return parseDammDataset(content);
    default:
      format satisfies never;
      throw new Error(`Unknown annotation format: ${format}`);
  }
}

export async function importAnnotationFile(
  file: string,
  format: AnnotationFormat
): Promise<UnifiedImage[]> {
  let content: string;
  try {
    content = await readFile(file, "utf8");
  } catch (error) {
    throw new DatasetIoError("read", file, error);
  }
  try {
    return parseAnnotationContent(format, content);
  } catch (error) {
    if (error instanceof AnnotationParseError) {
      throw error.withFilePath(file);
    }
    throw error;
  }
}

/**
 * Parse every file in order and merge the images into one list.
 * The first file that fails to parse aborts the import.
 */
export async function importDataset(options: {
  files: string[];
  format: AnnotationFormat;
  logger?: Logger;
}): Promise<{ images: UnifiedImage[]; processedFiles: number }> {
  const { files, format } = options;
  const logger = options.logger ?? createConsoleLogger();

  const images: UnifiedImage[] = [];
  let processed_files = 0;
  for (const file of files) {
    logger.info(`Processing: ${file}`);
    const file_images = await importAnnotationFile(file, format);
    logger.debug(`  -> ${file_images.length} images`);
    images.push(...file_images);
    processed_files++;
  }

  logger.info(
    `Imported ${images.length} images from ${processed_files} ${format} annotation files`
  );
  return { images, processedFiles: processed_files };
}
