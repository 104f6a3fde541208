/**
 * sentinel serve
 */

import { Command } from "commander";
import { startServer } from "../../server";
import { configFrom, openContext } from "../context";

export function serveCommand(): Command {
  const cmd = new Command("serve");
  cmd
    .description("Start the HTTP server (login routes, gates and admin API)")
    .option("-p, --port <port>", "port to listen on (overrides PORT)")
    .action(async (opts: { port?: string }) => {
      const config = configFrom(cmd);
      if (opts.port !== undefined) {
        const port = Number.parseInt(opts.port, 10);
        if (!Number.isInteger(port) || port < 0 || port > 65535) {
          cmd.error(`Invalid port: ${opts.port}`);
        }
        config.port = port;
      }

      const { sentinel, platform, users } = openContext(config, false);
      const server = await startServer({ sentinel, platform, verifier: users });

      const shutdown = (signal: string) => {
        sentinel.logger.info(`Received ${signal}, shutting down`);
        server.close(() => {
          sentinel.close().then(
            () => process.exit(0),
            (error: unknown) => {
              sentinel.logger.error(error instanceof Error ? error : new Error(String(error)));
              process.exit(1);
            }
          );
        });
      };
      process.once("SIGINT", () => shutdown("SIGINT"));
      process.once("SIGTERM", () => shutdown("SIGTERM"));
    });
  return cmd;
}
