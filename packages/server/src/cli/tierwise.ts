#!/usr/bin/env node
/**
 * tierwise CLI entrypoint
 *
 * Usage:
 *   tierwise [serve]           start the HTTP server (default)
 *   tierwise schema [mode]     apply a schema-generation mode and exit
 *   tierwise config            print the resolved configuration
 *
 * Every command takes `-c, --config <path>`.
 */
/* eslint-disable no-console */

import { Command } from "commander";
import { z } from "zod";
import { VERSION } from "../app.js";
import { loadAppConfig, redactConfig, SCHEMA_MODES, type LoadedAppConfig } from "../config/app-config.js";
import { openDatasource, startServer } from "../server.js";

const program = new Command("tierwise");
program.version(VERSION);
program.option("-c, --config <path>", "config file (default: ./tierwise.config.json)");

function loadConfig(): LoadedAppConfig {
  const { config } = program.opts<{ config?: string }>();
  return loadAppConfig({ configPath: config });
}

// ---------------------------------------------------------------------------
// tierwise serve
// ---------------------------------------------------------------------------

program
  .command("serve", { isDefault: true })
  .description("Start the HTTP server")
  .action(async () => {
    const loaded = loadConfig();
    const { host, port } = loaded.config.server;
    await startServer(loaded);
    console.log(`[tierwise] Listening on http://${host}:${port} (${loaded.config.datasource.url})`);
  });

// ---------------------------------------------------------------------------
// tierwise schema
// ---------------------------------------------------------------------------

program
  .command("schema")
  .description("Apply a schema-generation mode to the configured datasource and exit")
  .argument("[mode]", `one of ${SCHEMA_MODES.join(", ")} (default: configured mode)`)
  .action((mode: string | undefined) => {
    const loaded = loadConfig();
    const parsed = z.enum(SCHEMA_MODES).optional().safeParse(mode);
    if (!parsed.success) {
      console.error(`[tierwise] Unknown schema mode "${mode}". Expected one of: ${SCHEMA_MODES.join(", ")}`);
      process.exit(1);
    }

    const datasource = openDatasource(loaded, parsed.data);
    try {
      if (!datasource.schema) {
        console.log("[tierwise] memory: datasource has no schema, nothing to do");
        return;
      }
      const { mode: applied, applied: versions, dropped } = datasource.schema;
      console.log(`[tierwise] Schema mode: ${applied}`);
      console.log(`[tierwise]   dropped:  ${dropped ? "yes" : "no"}`);
      console.log(`[tierwise]   applied:  ${versions.length > 0 ? versions.join(", ") : "none"}`);
    } finally {
      datasource.close();
    }
  });

// ---------------------------------------------------------------------------
// tierwise config
// ---------------------------------------------------------------------------

program
  .command("config")
  .description("Print the resolved configuration (password masked)")
  .action(() => {
    const loaded = loadConfig();
    console.log(`[tierwise] Source: ${loaded.path ?? "defaults + environment"}`);
    console.log(JSON.stringify(redactConfig(loaded.config), null, 2));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`[tierwise] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
