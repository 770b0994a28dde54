/**
 * modelhub status
 */

import { Command } from "commander";
import { printTable } from "../utils/printTable";
import { withHub } from "../utils/openHub";
import { hubOptions, reportFailure } from "./shared";

export function statusCommand(): Command {
  const cmd = new Command("status");
  cmd.description("Probe every provider and show whether it is usable").action(async (_opts: unknown, command: Command) => {
    try {
      await withHub(hubOptions(command), async (hub) => {
        await hub.registry.authenticateAll();

        const rows = hub.registry.list().map((provider) => {
          const state = provider.state();
          return [
            provider.id,
            provider.name,
            provider.configurationView().title,
            String(state.models.length),
            state.error?.message ?? "",
          ];
        });
        printTable(["PROVIDER", "NAME", "STATUS", "MODELS", "ERROR"], rows);
      });
    } catch (e) {
      reportFailure("status", e);
    }
  });
  return cmd;
}
