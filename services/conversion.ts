import { execFile } from "node:child_process";
import path from "node:path";
import { promisify } from "node:util";
import { z } from "zod";

const execFileAsync = promisify(execFile);

export interface DocumentRasterizer {
  /** Renders the first page of a document into `outputDirectory`, returning the image path. */
  rasterize(documentPath: string, outputDirectory: string): Promise<string>;
}

export const RASTERIZED_MIME_TYPE = "image/png";

export const needsRasterizing = (extension: string): boolean =>
  extension.toLowerCase() === ".pdf";

export const pdftoppmOptionsSchema = z.object({
  executable: z.string().nonempty().optional().default("pdftoppm"),
  resolution: z.number().int().positive().optional().default(200),
});

// Poppler's pdftoppm, run as an external process
export class PdftoppmRasterizer implements DocumentRasterizer {
  #executable: string;
  #resolution: number;

  constructor(options: z.input<typeof pdftoppmOptionsSchema> = {}) {
    const { executable, resolution } = pdftoppmOptionsSchema.parse(options);
    this.#executable = executable;
    this.#resolution = resolution;
  }

  async rasterize(documentPath: string, outputDirectory: string): Promise<string> {
    const prefix = path.join(outputDirectory, "page");
    await execFileAsync(this.#executable, [
      "-png",
      "-r",
      String(this.#resolution),
      "-f",
      "1",
      "-l",
      "1",
      "-singlefile",
      documentPath,
      prefix,
    ]);
    return `${prefix}.png`;
  }
}
