// Loads data/sample-data.json into the database: `npm run seed`.
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";

import { addChain } from "@app/chains/ChainUseCase";
import {
  addKnowledgeChunk,
  ingestMarkdownFile,
} from "@app/knowledge/KnowledgeUseCase";
import {
  DocumentChunkInputSchema,
  PluginChainInputSchema,
} from "@domain/plugins/models";
import { closePool } from "@infrastructure/database/db";
import { initializeTables } from "@infrastructure/database/schema";
import { logger } from "@infrastructure/logging/Logger";
import { messageOf } from "@typesLocal/StatusCodeError";
import { z } from "zod";

const projectRoot = fileURLToPath(new URL("../../", import.meta.url));

const SampleDataSchema = z.object({
  chains: z.array(PluginChainInputSchema).default([]),
  knowledge: z.array(DocumentChunkInputSchema).default([]),
  documents: z.array(z.string().min(1)).default([]),
});

type SampleData = z.infer<typeof SampleDataSchema>;

function readSampleData(
  file = path.join(projectRoot, "data", "sample-data.json")
): SampleData {
  const raw: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
  return SampleDataSchema.parse(raw);
}

async function run(): Promise<void> {
  const data = readSampleData();

  await initializeTables();

  for (const chain of data.chains) {
    const { id } = await addChain(chain);
    logger.log("info", "SEED_CHAIN", { id, name: chain.name });
  }

  for (const chunk of data.knowledge) {
    const { id } = await addKnowledgeChunk(chunk);
    logger.log("info", "SEED_KNOWLEDGE", { id, source: chunk.source });
  }

  for (const document of data.documents) {
    const result = await ingestMarkdownFile({
      filepath: path.resolve(projectRoot, document),
    });
    logger.log("info", "SEED_DOCUMENT", { ...result });
  }

  logger.log("info", "SEED_COMPLETE", {
    chains: data.chains.length,
    knowledge: data.knowledge.length,
    documents: data.documents.length,
  });
}

async function main(): Promise<void> {
  try {
    await run();
  } finally {
    await closePool();
  }
}

main().catch((error: unknown) => {
  logger.log("error", "SEED_FAILED", { message: messageOf(error) });
  process.exitCode = 1;
});
