#!/usr/bin/env node
import path from "node:path";
import React from "react";
import { render } from "ink";
import meow from "meow";
import App from "./app";
import {
	getConfigPath,
	loadConfig,
	saveConfig,
	setConfigPathOverride,
	type AppConfig,
} from "./config";
import { describeError } from "./errors";
import { createProvider } from "./llm";
import { createLogger } from "./logger";
import { createSession } from "./session";

const cli = meow(
	`
	Usage
	  $ tollgate

	Description
	  Coding assistant for the terminal. Every file write, shell command and
	  git change the model asks for waits for your approval; the session
	  starts in SAFE mode, where none of them run at all.

	Environment
	  OPENAI_API_KEY / OPENAI_BASE_URL are used when the config leaves them empty.

	Options
	  --config, -c     Path to config file or directory (defaults to <workspace>/.tollgate.json)
	  --workspace, -w  Workspace root (defaults to the current directory)
	  --armed          Start in ARMED mode (each call still needs approval)
	  --init           Write the effective configuration to the config file and exit
	  --debug          Show key debugging info under the composer

	Examples
	  $ tollgate
	  $ tollgate -w ../project --armed
	  $ tollgate --init
`,
	{
		importMeta: import.meta,
		flags: {
			config: { type: "string", shortFlag: "c" },
			workspace: { type: "string", shortFlag: "w" },
			armed: { type: "boolean", default: false },
		init: { type: "boolean", default: false },
			debug: { type: "boolean", default: false },
		},
	}
);

const workspace = path.resolve(cli.flags.workspace ?? process.cwd());

if (cli.flags.config) setConfigPathOverride(cli.flags.config);

const configPath = await getConfigPath(workspace);

let cfg: AppConfig;
try {
	cfg = await loadConfig(configPath);
} catch (err) {
	console.error(`tollgate: cannot load configuration: ${describeError(err)}`);
	process.exit(1);
}

if (cli.flags.init) {
	try {
		await saveConfig(cfg, configPath);
	} catch (err) {
		console.error(`tollgate: cannot write ${configPath}: ${describeError(err)}`);
		process.exit(1);
	}
	console.log(`Wrote ${configPath}`);
	process.exit(0);
}

const { logger, memory } = createLogger({
	level: cfg.logging.level,
	file: cfg.logging.file || undefined,
	workspace,
});
const session = createSession({
	cfg,
	workspace,
	provider: createProvider(cfg),
	logger,
	armed: cli.flags.armed,
});
logger.info("session started", { workspace, model: session.model, armed: cli.flags.armed });

const app = render(<App session={session} logs={memory} debug={cli.flags.debug} />);
await app.waitUntilExit();
session.renderLoop.stop();
