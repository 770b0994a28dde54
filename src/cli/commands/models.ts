/**
 * modelhub models
 */

import { Command } from "commander";
import { printTable } from "../utils/printTable";
import { withHub } from "../utils/openHub";
import { hubOptions, reportFailure } from "./shared";

export function modelsCommand(): Command {
  const cmd = new Command("models");
  cmd
    .description("List models offered by reachable providers")
    .option("--json", "print JSON instead of a table")
    .action(async (opts: { json?: boolean }, command: Command) => {
      try {
        await withHub(hubOptions(command), async (hub) => {
          await hub.registry.authenticateAll();
          const models = hub.registry.availableModels();

          if (opts.json) {
            const rows = models.map((model) => ({
              provider: model.providerId,
              id: model.id,
              name: model.name,
              contextWindow: model.maxTokenCount(),
            }));
            console.log(JSON.stringify(rows, null, 2));
            return;
          }

          printTable(
            ["PROVIDER", "ID", "NAME", "CONTEXT"],
            models.map((model) => [model.providerId, model.id, model.name, String(model.maxTokenCount())])
          );
        });
      } catch (e) {
        reportFailure("models", e);
      }
    });
  return cmd;
}
