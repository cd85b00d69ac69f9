import "dotenv/config";
import { loadConfig, type AppConfig } from "./config/env.js";
import { logger } from "./lib/logger.js";
import { DEFAULT_STANCE_LEXICON, loadStanceLexicon } from "./analysis/stanceLexicon.js";
import { createApp } from "./api/index.js";
import { createPipeline } from "./app/pipeline.js";
import { indexCorpus, loadCorpusFile } from "./indexer/buildIndex.js";
import { createOpenAIClient, OpenAICompleter } from "./llm/client.js";
import { OpenAIEmbedder, type Embedder } from "./retrieval/embeddings.js";
import type { EmbeddingIndex } from "./store/embeddingIndex.js";
import { IndexHandle } from "./store/indexHandle.js";

const config = loadConfig();

// ============================================
// Upstream clients
// ============================================

const openai = createOpenAIClient(config.openai.apiKey, config.upstreamTimeoutMs);

const embedder = new OpenAIEmbedder({
  client: openai,
  model: config.openai.embeddingModel,
  dimensions: config.openai.embeddingDimensions,
});

const completer = new OpenAICompleter({
  client: openai,
  model: config.openai.completionModel,
});

async function buildFromCorpus(cfg: AppConfig, emb: Embedder): Promise<EmbeddingIndex> {
  const raw = await loadCorpusFile(cfg.corpus.file);
  return indexCorpus(raw, emb, { timeoutMs: cfg.upstreamTimeoutMs });
}

// ============================================
// Startup
// ============================================

async function main(): Promise<void> {
  logger.info("Starting decision copilot", {
    stage: "startup",
    port: config.port,
    corpusFile: config.corpus.file,
    completionModel: config.openai.completionModel,
    embeddingModel: config.openai.embeddingModel,
  });

  const lexicon = config.corpus.stanceLexiconFile
    ? loadStanceLexicon(config.corpus.stanceLexiconFile)
    : DEFAULT_STANCE_LEXICON;

  const handle = new IndexHandle(await buildFromCorpus(config, embedder));

  const pipeline = createPipeline({
    handle,
    embedder,
    completer,
    lexicon,
    settings: {
      ...config.retrieval,
      tokenBudget: config.tokenBudget,
      timeoutMs: config.upstreamTimeoutMs,
    },
  });

  // Build-then-swap: requests in flight keep the snapshot they started with
  let rebuilding = false;
  process.on("SIGHUP", () => {
    if (rebuilding) {
      logger.warn("Rebuild already in progress", { stage: "startup" });
      return;
    }
    rebuilding = true;
    logger.info("Rebuilding index", { stage: "startup", corpusFile: config.corpus.file });

    buildFromCorpus(config, embedder)
      .then((index) => {
        handle.swap(index);
      })
      .catch((err: unknown) => {
        logger.error("Index rebuild failed; keeping current snapshot", { stage: "startup", error: err });
      })
      .finally(() => {
        rebuilding = false;
      });
  });

  const app = createApp(pipeline, handle);
  app.listen(config.port, () => {
    logger.info("Server listening", {
      stage: "startup",
      port: config.port,
      indexSize: handle.current().index.size,
    });
  });
}

main().catch((err: unknown) => {
  logger.error("Startup failed", { stage: "startup", error: err });
  process.exit(1);
});
