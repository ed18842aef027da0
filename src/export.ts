import { basename, join } from "path";

import type { ClassIndex, UnifiedImage } from "./dataset";
import {
  copyImageFile,
  type ImageIndex,
  makeDir,
  resolveImage,
  saveTextFile,
} from "./fs";
import { data_types, group_types, type GroupType } from "./group";
import {
  toLabelFileContent,
  toLabelFilename,
  toYoloAnnotation,
  toYoloLabelString,
} from "./label";
import { createConsoleLogger, Logger } from "./logger";
import type { Random } from "./random";
import { splitDataset } from "./split";
import { toDataYamlString, toDetectYamlOptions } from "./yaml";

export type ExportYoloDatasetOptions = {
  images: UnifiedImage[];
  export_dataset_dir: string;
  image_index: ImageIndex;
  train_ratio: number;
  random: Random;
  class_index: ClassIndex;
  logger?: Logger;
};

export type ExportYoloDatasetResult = {
  group_counts: Record<GroupType, number>;
  copied_images: number;
  missing_images: number;
  label_files: number;
  annotations: number;
};

export type ExportFlatLabelsOptions = {
  images: UnifiedImage[];
  export_dataset_dir: string;
  class_index: ClassIndex;
  logger?: Logger;
};

export type ExportFlatLabelsResult = {
  label_files: number;
  annotations: number;
};

/** YOLO label lines of one image, recording every category id it uses */
export function toLabelLines(
  image: UnifiedImage,
  class_index: ClassIndex
): string[] {
  return image.annotations.map((annotation) => {
    class_index.add(annotation.category_id);
    return toYoloLabelString(
      toYoloAnnotation(annotation, image.width, image.height)
    );
  });
}

export function addCategories(image: UnifiedImage, class_index: ClassIndex) {
  for (const annotation of image.annotations) {
    class_index.add(annotation.category_id);
  }
}

export async function saveLabelFile(
  labels_dir: string,
  image: UnifiedImage,
  class_index: ClassIndex
): Promise<string> {
  const label_file = join(labels_dir, toLabelFilename(image.file_name));
  const lines = toLabelLines(image, class_index);
  await saveTextFile(label_file, toLabelFileContent(lines));
  return label_file;
}

export async function createExportDatasetDirs(
  export_dir_path: string
): Promise<void> {
  for (const group_type of group_types) {
    for (const data_type of data_types) {
      await makeDir(join(export_dir_path, group_type, data_type));
    }
  }
}

/**
 * Materialize `{train,val}/{images,labels}`.
 *
 * Images whose file cannot be found under the input root are counted as
 * missing and get neither an image copy nor a label file. Their category
 * ids still go into the class index.
 */
export async function exportYoloDataset(
  options: ExportYoloDatasetOptions
): Promise<ExportYoloDatasetResult> {
  const {
    images,
    export_dataset_dir,
    image_index,
    train_ratio,
    random,
    class_index,
  } = options;
  const logger = options.logger ?? createConsoleLogger();

  await createExportDatasetDirs(export_dataset_dir);

  const groups = splitDataset(images, train_ratio, random);
  logger.info(
    `Split ${images.length} images: ${groups.train.length} train, ${groups.val.length} val`
  );

  const result: ExportYoloDatasetResult = {
    group_counts: { train: 0, val: 0 },
    copied_images: 0,
    missing_images: 0,
    label_files: 0,
    annotations: 0,
  };

  for (const group_type of group_types) {
    const images_dir = join(export_dataset_dir, group_type, "images");
    const labels_dir = join(export_dataset_dir, group_type, "labels");

    for (const image of groups[group_type]) {
      addCategories(image, class_index);
      const image_file = resolveImage(image_index, image.file_name);
      if (!image_file) {
        logger.warn(`Image file not found: ${image.file_name}`);
        result.missing_images++;
        continue;
      }

      await copyImageFile(image_file, join(images_dir, basename(image_file)));
      result.copied_images++;

      const label_file = await saveLabelFile(labels_dir, image, class_index);
      result.label_files++;
      result.annotations += image.annotations.length;
      result.group_counts[group_type]++;
      logger.debug(
        `  -> Generated: ${label_file} (${image.annotations.length} annotations)`
      );
    }
  }

  logger.info(`Exported YOLO dataset to ${export_dataset_dir}`);
  return result;
}

/** One label file per image directly in the output directory, no split. */
export async function exportFlatLabels(
  options: ExportFlatLabelsOptions
): Promise<ExportFlatLabelsResult> {
  const { images, export_dataset_dir, class_index } = options;
  const logger = options.logger ?? createConsoleLogger();

  await makeDir(export_dataset_dir);

  const result: ExportFlatLabelsResult = { label_files: 0, annotations: 0 };
  for (const image of images) {
    const label_file = await saveLabelFile(
      export_dataset_dir,
      image,
      class_index
    );
    result.label_files++;
    result.annotations += image.annotations.length;
    logger.debug(
      `  -> Generated: ${label_file} (${image.annotations.length} annotations)`
    );
  }
  return result;
}

/**
 * `classes.txt`, one name per line by ascending category id.
 * Nothing is written when no annotation was converted.
 */
export async function saveClassesFile(
  export_dataset_dir: string,
  class_index: ClassIndex
): Promise<string | undefined> {
  if (class_index.isEmpty()) return undefined;
  const file = join(export_dataset_dir, "classes.txt");
  await saveTextFile(file, toLabelFileContent(class_index.names()));
  return file;
}

export async function saveDataYamlFile(
  export_dataset_dir: string,
  class_index: ClassIndex
): Promise<string> {
  const file = join(export_dataset_dir, "data.yaml");
  await saveTextFile(file, toDataYamlString(toDetectYamlOptions(class_index)));
  return file;
}
