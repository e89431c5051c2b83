#!/usr/bin/env node
import { render } from "ink";

import { App } from "./App.js";
import { AppController } from "./app/controller.js";
import { loadConfig } from "./config.js";
import { errorMessage, formatError } from "./errors.js";
import { OperationsPane } from "./panes/operationsPane.js";
import { RequestPane } from "./panes/requestPane.js";
import { ResponsePane } from "./panes/responsePane.js";
import { loadDocument } from "./services/documentLoader.js";
import { createLogger } from "./services/logger.js";
import { ensurePaths, type AppPaths } from "./services/paths.js";
import { createNavigation } from "./state/navigation.js";
import { EventQueue, type TerminalEvent } from "./tui/events.js";
import { FrameStore } from "./tui/frameStore.js";

const USAGE = "usage: specdeck <openapi.yaml|openapi.json>";

function exitWith(message: string, code: number): never {
  process.stderr.write(`${message}\n`);
  process.exit(code);
}

const loaded = loadConfig(process.env);
if (!loaded.ok) {
  exitWith(`specdeck error: invalid configuration: ${loaded.error}`, 1);
}
const config = loaded.config;

let paths: AppPaths;
try {
  paths = ensurePaths();
} catch (err) {
  exitWith(`specdeck error: ${errorMessage(err)}`, 1);
}
const logger = createLogger({ level: config.logLevel, path: paths.logPath });

const documentPath = process.argv[2] ?? config.documentPath;
if (!documentPath) {
  exitWith(USAGE, 2);
}

const document = loadDocument(documentPath);
if (!document.ok) {
  logger.error(formatError(document.error));
  exitWith(`specdeck error: ${formatError(document.error)}`, 1);
}
logger.info(`loaded ${documentPath}: ${document.value.info.title} ${document.value.info.version}`);

const state = createNavigation(document.value);
const controller = new AppController(
  [
    new OperationsPane(state, true),
    new RequestPane(state, { mediaType: config.mediaType }),
    new ResponsePane(state, { mediaType: config.mediaType }),
  ],
  {
    state,
    size: { width: process.stdout.columns ?? 80, height: process.stdout.rows ?? 24 },
    splitRatio: config.splitRatio,
    logger,
  },
);

const events = new EventQueue<TerminalEvent>();
const store = new FrameStore();
const ink = render(<App store={store} events={events} />, { exitOnCtrlC: false });
const ticker = setInterval(() => events.push({ kind: "tick" }), config.tickMs);

const outcome = await controller.run(events, store);

clearInterval(ticker);
events.close();
ink.unmount();
await ink.waitUntilExit();

if (!outcome.ok) {
  exitWith(`specdeck error: ${formatError(outcome.error)}`, 1);
}
logger.info("exit");
