/**
 * Link command - Print text with citations turned into HTML links
 */

import { readFile } from "fs/promises";
import { text as readStream } from "node:stream/consumers";
import { z } from "zod";
import { createCitationLinker } from "../../citations";
import { CitationsConfigSchema } from "../../types/config";
import { loadCommandConfig, reportCommandError } from "./shared";

const LinkOptionsSchema = z.object({
  file: z.string().optional(),
  config: z.string().optional(),
  host: CitationsConfigSchema.shape.host.optional(),
});

type Options = z.infer<typeof LinkOptionsSchema>;

export async function linkCommand(
  text: string | undefined,
  opts: Options,
): Promise<void> {
  try {
    const options = LinkOptionsSchema.parse(opts);
    const { config } = await loadCommandConfig(options.config);

    if (options.host) {
      config.citations.host = options.host;
    }

    // Argument, then file, then stdin
    const input =
      text ??
      (options.file
        ? await readFile(options.file, "utf-8")
        : await readStream(process.stdin));

    const link = createCitationLinker(config.citations);
    process.stdout.write(link(input).toHTML());
    if (!input.endsWith("\n")) {
      process.stdout.write("\n");
    }
  } catch (error) {
    reportCommandError(error);
    process.exit(1);
  }
}
