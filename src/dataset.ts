export const annotation_formats = ["standard", "damm"] as const;

export type AnnotationFormat = (typeof annotation_formats)[number];

export const isAnnotationFormat = (value: string): value is AnnotationFormat =>
  value === "standard" || value === "damm";

/** [x1, y1, x2, y2] in absolute pixels, top-left and bottom-right corners */
export type CornerBox = [x1: number, y1: number, x2: number, y2: number];

/** [x_center, y_center, width, height], normalized by image size */
export type CenterBox = [
  x_center: number,
  y_center: number,
  width: number,
  height: number,
];

export type UnifiedAnnotation = {
  /** kept as given, inverted or degenerate boxes included */
  bbox: CornerBox;
  category_id: number;
};

export type UnifiedImage = {
  /** as declared in the annotation file, may carry a directory prefix */
  file_name: string;
  width: number;
  height: number;
  annotations: UnifiedAnnotation[];
};

export type YoloAnnotation = {
  class_id: number;
  x_center: number;
  y_center: number;
  width: number;
  height: number;
};

export function toClassName(category_id: number): string {
  return `class_${category_id}`;
}

/**
 * Category ids seen during a run, each mapped to a placeholder class name.
 * Passed through the export steps instead of living in module state.
 */
export class ClassIndex {
  private names_by_id = new Map<number, string>();

  add(category_id: number): void {
    if (this.names_by_id.has(category_id)) return;
    this.names_by_id.set(category_id, toClassName(category_id));
  }

  has(category_id: number): boolean {
    return this.names_by_id.has(category_id);
  }

  get size(): number {
    return this.names_by_id.size;
  }

  isEmpty(): boolean {
    return this.names_by_id.size === 0;
  }

  /** ascending by numeric id */
  ids(): number[] {
    return Array.from(this.names_by_id.keys()).sort((a, b) => a - b);
  }

  /** class names ordered by ascending id */
  names(): string[] {
    return this.ids().map((id) => this.names_by_id.get(id) ?? toClassName(id));
  }
}
