import {Logger, LogHandler} from "@slashwatch/utils";

const discard: LogHandler = () => {
  // Do nothing
};

/**
 * Logger that drops every entry, default for library code run without a logger
 */
export function getEmptyLogger(): Logger {
  return {error: discard, warn: discard, info: discard, verbose: discard, debug: discard};
}
