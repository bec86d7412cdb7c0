import fs from "node:fs/promises";
import path from "node:path";
import { availableFormats, resolveFormatter, type FormatChoice, type FormatInput, type Formatter } from "../formatters/index.js";
import type { Logger } from "../utils/logger.js";

export class FormatterService {
  constructor(private readonly logger?: Logger) {}

  getAvailableFormats(): FormatChoice[] {
    return availableFormats();
  }

  getFormatter(choice: string): Formatter {
    return resolveFormatter(choice);
  }

  formatData(input: FormatInput, choice: string): string {
    return resolveFormatter(choice).format(input);
  }

  /** Writes the formatted document and returns the final path, extension included. */
  async saveToFile(input: FormatInput, outputFile: string, choice: string): Promise<string> {
    const formatter = resolveFormatter(choice);
    const suffix = `.${formatter.extension}`;
    const target = outputFile.endsWith(suffix) ? outputFile : `${outputFile}${suffix}`;

    await fs.mkdir(path.dirname(path.resolve(target)), { recursive: true });
    await fs.writeFile(target, formatter.format(input), "utf-8");
    this.logger?.info({ file: target, format: formatter.name }, "output written");
    return target;
  }
}
