/**
 * Command-line argument parsing and output formatting
 */

import { Constant } from "./constant";
import { ConfigurationError } from "./errors";
import { isLogLevel, LogLevel } from "./logger";
import { formatValue } from "./utils";

export type CliOptions = {
  headers: string[];
  lang?: string;
  cc?: string;
  cflags: string[];
  includeDirs: string[];
  filter?: string;
  resolve: boolean;
  json: boolean;
  configPath?: string;
  logLevel?: LogLevel;
  help: boolean;
};

export const USAGE = [
  "usage: macroprobe [options] <header...>",
  "",
  "  --lang <c|c++>       language of the headers (default c)",
  "  --cc <command>       compiler command, split on whitespace",
  "  --cflag <flag>       extra compiler flag, repeatable",
  "  -I <dir>             include directory, repeatable",
  "  --filter <regex>     macro names to keep (default: not starting with _)",
  "  --resolve            ask the compiler about every macro the text does not settle",
  "  --json               print JSON instead of tab-separated lines",
  "  --config <path>      configuration file (default macroprobe.config.json)",
  "  --log-level <level>  debug, info, warn or error",
  "  -h, --help           show this help",
].join("\n");

export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    headers: [],
    cflags: [],
    includeDirs: [],
    resolve: false,
    json: false,
    help: false,
  };

  const takeValue = (index: number, flag: string): string => {
    const value = argv[index + 1];
    if (value === undefined) {
      throw new ConfigurationError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "--lang":
        options.lang = takeValue(i++, arg);
        break;
      case "--cc":
        options.cc = takeValue(i++, arg);
        break;
      case "--cflag":
        options.cflags.push(takeValue(i++, arg));
        break;
      case "-I":
        options.includeDirs.push(takeValue(i++, arg));
        break;
      case "--filter":
        options.filter = takeValue(i++, arg);
        break;
      case "--config":
        options.configPath = takeValue(i++, arg);
        break;
      case "--log-level": {
        const level = takeValue(i++, arg);
        if (!isLogLevel(level)) {
          throw new ConfigurationError(`unknown log level: ${level}`);
        }
        options.logLevel = level;
        break;
      }
      case "--resolve":
        options.resolve = true;
        break;
      case "--json":
        options.json = true;
        break;
      case "-h":
      case "--help":
        options.help = true;
        break;
      default:
        if (arg.startsWith("-I") && arg.length > 2) {
          options.includeDirs.push(arg.slice(2));
        } else if (arg.startsWith("-")) {
          throw new ConfigurationError(`unknown option: ${arg}`);
        } else {
          options.headers.push(arg);
        }
    }
  }

  return options;
}

/**
 * NAME, type and value separated by tabs; unresolved types print as "?"
 * unless resolution is forced
 */
export function formatConstantLine(constant: Constant, resolve: boolean): string {
  if (!resolve && !constant.isTypeResolved()) {
    return [constant.name, "?", constant.rawValue ?? ""].join("\t");
  }
  return [constant.name, constant.type(), formatValue(constant.value())].join("\t");
}

export function formatConstants(constants: Constant[], resolve: boolean, json: boolean): string {
  if (json) {
    const rows = constants.map((constant) =>
      resolve || constant.isTypeResolved()
        ? constant.toJSON()
        : { name: constant.name, rawValue: constant.rawValue }
    );
    return JSON.stringify(rows, null, 2);
  }
  return constants.map((constant) => formatConstantLine(constant, resolve)).join("\n");
}
