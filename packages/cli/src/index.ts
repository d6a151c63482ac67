#!/usr/bin/env node
import * as path from "node:path";
import {
  basicLogger,
  createNodeServer,
  defaultConfig,
  filteredLogger,
  type Logger,
  NodeFileSystem,
  prefixedLogger,
} from "@minihttpd/engine";
import { CliUsageError, HELP_TEXT, parseArgs } from "./args.js";
import { buildRouter } from "./routes.js";
import { readVersion } from "./version.js";

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2));
  if (command.kind === "help") {
    console.log(HELP_TEXT);
    return;
  }
  if (command.kind === "version") {
    console.log(readVersion());
    return;
  }

  const args = command.options;
  const base = prefixedLogger("minihttpd", basicLogger());
  const logger: Logger = args.quiet ? filteredLogger("warn", base) : base;

  const statics = args.statics.map((route) => ({
    urlPath: route.urlPath,
    filePath: path.resolve(route.filePath),
  }));
  const router = buildRouter(
    { demo: args.demo, statics, publicDir: path.resolve("public") },
    new NodeFileSystem(),
  );
  if (router.size === 0) {
    logger.warn("No routes registered; every request will get a 404");
  }

  const config = {
    ...defaultConfig(),
    port: args.port,
    host: args.host,
    quiet: args.quiet,
    maxConnections: args.maxConnections ?? defaultConfig().maxConnections,
  };

  const server = createNodeServer({ config, router, logger });

  const port = await server.start();

  const url = `http://${config.host === "0.0.0.0" ? "localhost" : config.host}:${port}`;
  console.log(`\n  minihttpd serving ${router.size} route(s)\n`);
  console.log(`  Local:   ${url}`);
  if (config.host === "0.0.0.0") {
    console.log(`  Network: http://0.0.0.0:${port}`);
  }
  for (const route of router.paths()) {
    console.log(`  Route:   ${route}`);
  }
  console.log();

  let stopping = false;
  const shutdown = () => {
    if (stopping) return;
    stopping = true;
    console.log("\nShutting down...");
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Error during shutdown:", err);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  if (err instanceof CliUsageError) {
    console.error(err.message);
    console.error(HELP_TEXT);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
