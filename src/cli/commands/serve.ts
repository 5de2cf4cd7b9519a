/**
 * Serve command - Start the web front end
 */

import { z } from "zod";
import { createSiteContext } from "../../site/context";
import { startServer } from "../../site/server";
import { loadSiteEnv } from "../../utils/load-env";
import { loadCommandConfig, reportCommandError } from "./shared";

const ServeOptionsSchema = z.object({
  port: z.coerce.number().int().nonnegative().optional(),
  host: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof ServeOptionsSchema>;

export async function serveCommand(opts: Options): Promise<void> {
  try {
    const options = ServeOptionsSchema.parse(opts);
    const { config, logger } = await loadCommandConfig(options.config, options.verbose);

    // Override with CLI options
    if (options.port !== undefined) {
      config.server.port = options.port;
    }
    if (options.host) {
      config.server.host = options.host;
    }

    const env = loadSiteEnv();
    const ctx = await createSiteContext(config, env, logger);
    await startServer(ctx);
  } catch (error) {
    reportCommandError(error);
    process.exit(1);
  }
}
