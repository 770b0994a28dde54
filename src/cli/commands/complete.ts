/**
 * modelhub complete <prompt...>
 * Streams a completion to stdout; Ctrl+C stops the stream.
 */

import { Command, InvalidArgumentError } from "commander";
import { LanguageModel } from "../../core/models";
import { ModelHub } from "../../core/hub";
import { createRequest, LanguageModelRequestMessage } from "../../core/types";
import { withHub } from "../utils/openHub";
import { hubOptions, reportFailure } from "./shared";

interface CompleteOptions {
  model?: string;
  system?: string;
  temperature?: number;
  stop?: string[];
}

function parseTemperature(value: string): number {
  const parsed = Number.parseFloat(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function resolveModel(hub: ModelHub, id: string | undefined): LanguageModel {
  const models = hub.registry.availableModels();
  const model = id === undefined ? models[0] : models.find((candidate) => candidate.id === id);
  if (!model) {
    throw new Error(id === undefined ? "No models available; run `modelhub status`" : `No provider offers model ${id}`);
  }
  return hub.registry.selectModel(model.providerId, model.id);
}

export function completeCommand(): Command {
  const cmd = new Command("complete");
  cmd
    .description("Stream a completion for a prompt")
    .argument("<prompt...>", "user message")
    .option("-m, --model <id>", "model id (defaults to the first available model)")
    .option("-s, --system <text>", "system message")
    .option("-t, --temperature <value>", "sampling temperature", parseTemperature)
    .option("--stop <sequence...>", "stop sequences")
    .action(async (prompt: string[], opts: CompleteOptions, command: Command) => {
      try {
        await withHub(hubOptions(command), async (hub) => {
          await hub.registry.authenticateAll();
          const model = resolveModel(hub, opts.model);

          const messages: LanguageModelRequestMessage[] = [];
          if (opts.system) {
            messages.push({ role: "system", content: opts.system });
          }
          messages.push({ role: "user", content: prompt.join(" ") });
          const request = createRequest({ messages, stop: opts.stop, temperature: opts.temperature });

          const stream = await model.streamCompletion(request);
          const onInterrupt = () => {
            void stream.cancel();
          };
          process.once("SIGINT", onInterrupt);
          try {
            for await (const delta of stream) {
              process.stdout.write(delta);
            }
            process.stdout.write("\n");
          } finally {
            process.removeListener("SIGINT", onInterrupt);
          }
        });
      } catch (e) {
        reportFailure("complete", e);
      }
    });
  return cmd;
}
