/**
 * modelhub load <model>
 */

import { Command } from "commander";
import { withHub } from "../utils/openHub";
import { hubOptions, reportFailure } from "./shared";

export function loadCommand(): Command {
  const cmd = new Command("load");
  cmd
    .description("Ask the backend to load a model into memory ahead of use")
    .argument("<model>", "model id, e.g. llama3:latest")
    .action(async (id: string, _opts: unknown, command: Command) => {
      try {
        await withHub(hubOptions(command), async (hub) => {
          await hub.registry.authenticateAll();
          const model = hub.registry.availableModels().find((candidate) => candidate.id === id);
          const provider = model && hub.registry.lookup(model.providerId);
          if (!model || !provider) {
            throw new Error(`No provider offers model ${id}`);
          }

          if (await provider.loadModel(model)) {
            console.log(`Loaded ${model.telemetryId}`);
          } else {
            console.error(`Could not load ${model.telemetryId}; see the log for details`);
            process.exitCode = 1;
          }
        });
      } catch (e) {
        reportFailure("load", e);
      }
    });
  return cmd;
}
