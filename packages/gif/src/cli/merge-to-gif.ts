#!/usr/bin/env tsx
import { Disposable } from "@clipgif/core";
import { NodeMediaToolRunner } from "../runner";
import { runCli } from "./program";

const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = { SIGINT: 130, SIGTERM: 143 };

const lifecycle = new Disposable();
const runner = new NodeMediaToolRunner();

function onSignal(signal: NodeJS.Signals): void {
  console.warn(`[clipgif] Received ${signal}, removing scratch files.`);
  runner.killActive(signal);
  void lifecycle
    .run()
    .catch((error) => console.error("[clipgif] Failed to remove scratch files", error))
    .finally(() => process.exit(SIGNAL_EXIT_CODES[signal] ?? 1));
}

process.once("SIGINT", onSignal);
process.once("SIGTERM", onSignal);

runCli(process.argv.slice(2), { runner, lifecycle })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("clipgif failed", error);
    process.exitCode = 1;
  })
  .finally(() => {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  });
