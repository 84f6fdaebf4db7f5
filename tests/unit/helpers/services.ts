import type { CommandServices } from "../../../src/cli/types";
import type { FacebookPostRecord, ScrapedRecord } from "../../../src/domain/models";
import type { ModelCatalog, ModelInfo } from "../../../src/llm/contracts";
import { LlmInstructionInterpreter } from "../../../src/orchestration/instruction-interpreter";
import type { RecordExporter } from "../../../src/services/csv-exporter";
import { FakeExtractor, FakeLLM, FakeSessionProvider } from "./fakes";

export class FakeExporter implements RecordExporter {
  deep: Array<{ term: string; records: ScrapedRecord[] }> = [];
  web: Array<{ engine: string; term: string; records: ScrapedRecord[] }> = [];
  fb: Array<{ tag: string; records: FacebookPostRecord[] }> = [];

  async writeDeepScrape(term: string, records: ScrapedRecord[]): Promise<string> {
    this.deep.push({ term, records });
    return `/tmp/deepscrape_${term}.csv`;
  }

  async writeWebScrape(engine: string, term: string, records: ScrapedRecord[]): Promise<string> {
    this.web.push({ engine, term, records });
    return `/tmp/webscrape_${engine}_${term}.csv`;
  }

  async writeFacebookPosts(tag: string, records: FacebookPostRecord[]): Promise<string> {
    this.fb.push({ tag, records });
    return `/tmp/fb_${tag}_posts.csv`;
  }
}

export class FakeCatalog implements ModelCatalog {
  constructor(private readonly models: ModelInfo[]) {}

  async listModels(): Promise<ModelInfo[]> {
    return this.models;
  }

  async retrieveModel(id: string): Promise<ModelInfo> {
    const model = this.models.find((m) => m.id === id);
    if (!model) throw new Error(`model ${id} not found`);
    return model;
  }
}

export interface TestServices extends CommandServices {
  llm: FakeLLM;
  extractor: FakeExtractor;
  sessions: FakeSessionProvider;
  exporter: FakeExporter;
}

export function createTestServices(overrides: Partial<TestServices> = {}): TestServices {
  const llm = overrides.llm ?? new FakeLLM("{}");
  const extractor = overrides.extractor ?? new FakeExtractor();
  const sessions = overrides.sessions ?? new FakeSessionProvider();
  const exporter = overrides.exporter ?? new FakeExporter();
  const catalog = new FakeCatalog([
    { id: "gpt-4o-mini", ownedBy: "system", created: 1_700_000_000 },
    { id: "text-embedding-3-small", ownedBy: "system", created: 1_700_000_000 },
    { id: "whisper-1", ownedBy: "system", created: 1_700_000_000 },
  ]);

  return {
    hasCredentials: () => true,
    createLLM: () => llm,
    createModelCatalog: () => catalog,
    createInterpreter: (client) =>
      new LlmInstructionInterpreter(client, { results: 10, platforms: "duckduckgo", depth: 0, timeoutSeconds: 900 }),
    createExtractor: () => extractor,
    createPostExtractor: () => extractor,
    createSessionProvider: () => sessions,
    clock: () => 1_704_067_200_000,
    pause: async () => undefined,
    pricePer1kTokens: 0.001,
    ...overrides,
    llm,
    extractor,
    sessions,
    exporter,
  };
}
