import { Command } from "commander";
import { ModelHubError } from "../../core/errors";
import { CliHubOptions } from "../utils/openHub";

export type GlobalOptions = {
  provider?: string;
  config?: string;
};

export function hubOptions(command: Command): CliHubOptions {
  const { provider, config } = command.optsWithGlobals<GlobalOptions>();
  return { provider, config };
}

/**
 * Print a failed command's error and mark the process as failed
 */
export function reportFailure(action: string, error: unknown): void {
  if (error instanceof ModelHubError) {
    console.error(`${action} failed [${error.code}]: ${error.message}`);
  } else {
    console.error(`${action} failed:`, error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
}
