import { basename, extname } from "path";

import type {
  CenterBox,
  CornerBox,
  UnifiedAnnotation,
  YoloAnnotation,
} from "./dataset";

/**
 * Corner-form pixel box to normalized center form.
 * Image size is trusted: a zero width or height gives non-finite values.
 */
export function toCenterForm(
  bbox: CornerBox,
  img_width: number,
  img_height: number
): CenterBox {
  const [x1, y1, x2, y2] = bbox;
  const box_width = x2 - x1;
  const box_height = y2 - y1;
  return [
    (x1 + box_width / 2) / img_width,
    (y1 + box_height / 2) / img_height,
    box_width / img_width,
    box_height / img_height,
  ];
}

export function toYoloAnnotation(
  annotation: UnifiedAnnotation,
  img_width: number,
  img_height: number
): YoloAnnotation {
  const [x_center, y_center, width, height] = toCenterForm(
    annotation.bbox,
    img_width,
    img_height
  );
  return {
    class_id: annotation.category_id,
    x_center,
    y_center,
    width,
    height,
  };
}

const DECIMALS = 6;

/**
 * `value` with six decimals. A value exactly halfway between two
 * candidates (e.g. `1 / 128`) is rounded to the even one; `toFixed` alone
 * would round it away from zero. Non-finite values print as `inf`, `-inf`
 * and `NaN`.
 */
export function formatDecimal(value: number): string {
  if (Number.isNaN(value)) return "NaN";
  if (!Number.isFinite(value)) return value > 0 ? "inf" : "-inf";

  const rounded = value.toFixed(DECIMALS);
  // every finite double has a terminating decimal expansion
  const exact = value.toFixed(100);
  const dot = exact.indexOf(".");
  if (dot === -1) return rounded;

  const truncated = exact.slice(0, dot + 1 + DECIMALS);
  const rest = exact.slice(dot + 1 + DECIMALS);
  if (!/^50*$/.test(rest)) return rounded;

  const last_digit = Number(truncated[truncated.length - 1]);
  return last_digit % 2 === 0 ? truncated : rounded;
}

/** e.g. `"3 0.200000 0.200000 0.200000 0.200000"` */
export function toYoloLabelString(annotation: YoloAnnotation): string {
  const { class_id, x_center, y_center, width, height } = annotation;
  return [x_center, y_center, width, height].reduce(
    (line, value) => `${line} ${formatDecimal(value)}`,
    `${class_id}`
  );
}

/** Newline-terminated lines, or an empty string when there are none. */
export function toLabelFileContent(lines: string[]): string {
  if (lines.length === 0) return "";
  return lines.join("\n") + "\n";
}

/** `"a/b/img1.jpg"` -> `"img1.jpg"`, also for Windows separators */
export function toBaseName(file_name: string): string {
  return basename(file_name.replaceAll("\\", "/"));
}

/** `"a/b/img1.jpg"` -> `"img1"` */
export function toStem(file_name: string): string {
  const base_name = toBaseName(file_name);
  return basename(base_name, extname(base_name));
}

export function toLabelFilename(image_filename: string): string {
  return toStem(image_filename) + ".txt";
}
