#!/usr/bin/env node
import { resolve } from "node:path";
import { ConfigManager } from "./lib/config";
import { formatConstants, parseCliArgs, USAGE } from "./lib/cli";
import { MacroDiscovery } from "./lib/discovery";
import { describeError, ToolInvocationError } from "./lib/errors";
import { globalLogger } from "./lib/logger";

const PROJECT_ROOT = process.cwd();

function main(argv: string[]): void {
  const args = parseCliArgs(argv);
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const configManager = new ConfigManager(
    PROJECT_ROOT,
    args.configPath ? resolve(PROJECT_ROOT, args.configPath) : undefined
  );
  configManager.loadEnvironment();
  globalLogger.setLevel(args.logLevel ?? configManager.getLogLevel());
  globalLogger.pushContext({ component: "macroprobe" });

  const options = configManager.toDiscoveryOptions({
    headers: args.headers.length > 0 ? args.headers : undefined,
    lang: args.lang,
    cc: args.cc,
    extraCflags:
      args.cflags.length > 0 || args.includeDirs.length > 0
        ? [...(configManager.getConfig().extraCflags ?? []), ...args.includeDirs.map((dir) => `-I${dir}`), ...args.cflags]
        : undefined,
    filter: args.filter !== undefined ? new RegExp(args.filter) : undefined,
  });

  const discovery = new MacroDiscovery(options, { logger: globalLogger });
  const constants = discovery.run();
  console.log(formatConstants(constants, args.resolve, args.json));

  const summary = discovery.auditLog.getSummary();
  globalLogger.debug(`Discovered ${constants.length} macro(s)`, {
    heuristic: summary.heuristicCount,
    compilerResolved: summary.compilerResolvedCount,
    failures: summary.failureCount,
    parseWarnings: summary.parseWarningCount,
  });
}

try {
  main(process.argv.slice(2));
} catch (error) {
  globalLogger.error(describeError(error));
  if (error instanceof ToolInvocationError) {
    globalLogger.debug("Failed command", { command: error.command });
  }
  process.exitCode = 1;
}
