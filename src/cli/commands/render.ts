/**
 * Render command - Fetch one domain report and write its page
 */

import { writeFile } from "fs/promises";
import ora from "ora";
import { z } from "zod";
import { createSiteContext } from "../../site/context";
import { SiteService } from "../../site/service";
import { loadSiteEnv } from "../../utils/load-env";
import { loadCommandConfig, reportCommandError } from "./shared";

const RenderOptionsSchema = z.object({
  output: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof RenderOptionsSchema>;

export async function renderCommand(domain: string, opts: Options): Promise<void> {
  const spinner = ora({ text: "Loading configuration...", indent: 2, stream: process.stderr }).start();

  try {
    const options = RenderOptionsSchema.parse(opts);
    const { config, logger } = await loadCommandConfig(options.config, options.verbose);
    const env = loadSiteEnv();
    const ctx = await createSiteContext(config, env, logger);
    const site = new SiteService(ctx);

    spinner.text = `Fetching report for ${domain}...`;
    const page = await site.renderDomain(domain);

    if (options.output) {
      await writeFile(options.output, page.html, "utf-8");
      spinner.succeed(`Wrote ${options.output} (HTTP ${page.status})`);
    } else {
      spinner.stop();
      process.stdout.write(page.html);
    }

    process.exitCode = page.status === 200 ? 0 : 1;
  } catch (error) {
    spinner.fail("Render failed");
    reportCommandError(error);
    process.exit(1);
  }
}
