import { Command } from "commander";
import type { ModelInfo } from "../../llm/contracts";
import { parseCommandArgs } from "../args";
import type { CommandContext, PluginDescriptor } from "../types";

export interface ModelGroups {
  gpt: string[];
  embedding: string[];
  other: string[];
}

export function groupModels(models: ModelInfo[]): ModelGroups {
  const groups: ModelGroups = { gpt: [], embedding: [], other: [] };
  for (const { id } of models) {
    const lowered = id.toLowerCase();
    if (lowered.includes("gpt")) groups.gpt.push(id);
    else if (lowered.includes("embedding")) groups.embedding.push(id);
    else groups.other.push(id);
  }
  groups.gpt.sort();
  groups.embedding.sort();
  groups.other.sort();
  return groups;
}

export function formatCreated(created: number): string {
  return new Date(created * 1000).toISOString().slice(0, 10);
}

async function listModels(_args: string[], ctx: CommandContext): Promise<number> {
  const models = await ctx.services.createModelCatalog().listModels();
  const groups = groupModels(models);
  const sections: Array<[string, string[]]> = [
    ["GPT models", groups.gpt],
    ["Embedding models", groups.embedding],
    ["Other models", groups.other],
  ];

  for (const [title, ids] of sections) {
    if (ids.length === 0) continue;
    ctx.io.print(`${title}:`);
    for (const id of ids) ctx.io.print(`  - ${id}`);
  }
  ctx.io.print(`Found ${models.length} model(s)`);
  return 0;
}

async function testConnection(_args: string[], ctx: CommandContext): Promise<number> {
  const models = await ctx.services.createModelCatalog().listModels();
  ctx.io.print(`Connection OK: ${models.length} model(s) available`);
  return 0;
}

const MODEL_INFO_USAGE = "model-info <name>";

async function modelInfo(args: string[], ctx: CommandContext): Promise<number> {
  const parsed = parseCommandArgs(
    new Command("model-info").argument("<name>", "model id, e.g. gpt-4o-mini"),
    args,
    MODEL_INFO_USAGE
  );
  const [name = ""] = parsed.args;
  const model = await ctx.services.createModelCatalog().retrieveModel(name);

  ctx.io.print(`Model:   ${model.id}`);
  ctx.io.print(`Owner:   ${model.ownedBy}`);
  ctx.io.print(`Created: ${formatCreated(model.created)}`);
  return 0;
}

export const modelsPlugin: PluginDescriptor = {
  name: "models",
  description: "Inference service model catalog",
  version: "1.0.0",
  commands: {
    models: {
      description: "List available models grouped by family",
      usage: "models",
      requiresCredentials: true,
      handler: listModels,
    },
    "test-openai": {
      description: "Check the connection to the inference service",
      usage: "test-openai",
      requiresCredentials: true,
      handler: testConnection,
    },
    "model-info": {
      description: "Show details for one model",
      usage: MODEL_INFO_USAGE,
      requiresCredentials: true,
      handler: modelInfo,
    },
  },
};
