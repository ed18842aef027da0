import type { ClassIndex } from "./dataset";
import { toClassName } from "./dataset";

function toString(data: unknown): string {
  return Array.isArray(data)
    ? "[" + data.map(toString).join(", ") + "]"
    : JSON.stringify(data);
}

export type DetectYamlOptions = {
  train_path?: string;
  val_path?: string;
  n_class: number;
  class_names?: string[];
};

class YamlBuilder {
  lines: string[] = [];

  addLine(line: string) {
    this.lines.push(line);
  }

  toString(): string {
    return this.lines.join("\n").trim() + "\n";
  }
}

export function toDataYamlString(options: DetectYamlOptions): string {
  let yaml = new YamlBuilder();
  if (options.train_path) {
    yaml.addLine(`train: ${options.train_path}`);
  }
  if (options.val_path) {
    yaml.addLine(`val: ${options.val_path}`);
  }
  yaml.addLine(``);
  yaml.addLine(`nc: ${options.n_class} # Number of classes`);

  if (options.class_names) {
    let class_names = options.class_names;

    if (class_names.length !== options.n_class) {
      throw new Error(
        `Number of class_names (${class_names.length}) does not match n_class (${options.n_class})`
      );
    }

    yaml.addLine("# Class names");
    if (class_names.length > 1) {
      yaml.addLine(`names:`);
      for (let i = 0; i < class_names.length; i++) {
        yaml.addLine(`  ${i}: ${class_names[i]}`);
      }
    } else {
      yaml.addLine(`names: ${toString(class_names)}`);
    }
  }

  return yaml.toString();
}

/**
 * YOLO class indexes are positional, so every index up to the highest
 * category id gets a name, seen or not.
 */
export function toDetectYamlOptions(class_index: ClassIndex): DetectYamlOptions {
  const ids = class_index.ids();
  const n_class = ids.length > 0 ? ids[ids.length - 1] + 1 : 0;
  return {
    train_path: "train/images",
    val_path: "val/images",
    n_class,
    class_names: Array.from({ length: n_class }, (_, i) => toClassName(i)),
  };
}
