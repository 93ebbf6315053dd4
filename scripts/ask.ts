import { parseArgs } from "node:util";
import "dotenv/config";
import { loadConfig } from "../src/config/env.js";
import { createQueryAgent } from "../src/services/createQueryAgent.js";
import { ConsoleLogger } from "../src/utils/logger.js";

const USAGE = 'Usage: ask [--corpus <file>] [--json] "<question>"';

async function main() {
  const { values, positionals } = parseArgs({
    options: {
      corpus: { type: "string" },
      json: { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  const question = positionals.join(" ").trim();
  if (!question) {
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const config = loadConfig();
  const logger = new ConsoleLogger({ level: config.logLevel });
  const agent = createQueryAgent(config, logger);

  const corpusPath = values.corpus ?? config.corpusPath;
  if (corpusPath) {
    await agent.indexDocumentFile(corpusPath);
  }

  const answer = await agent.handleQuery(question);
  if (values.json) {
    console.log(JSON.stringify(answer, null, 2));
    return;
  }

  console.log(answer.text);
  if (answer.provenance === "document_qa" && answer.retrieval.length > 0) {
    console.log("");
    console.log("Sources:");
    for (const hit of answer.retrieval) {
      console.log(`- ${hit.chunk.documentId}#${hit.chunk.index} (score ${hit.score.toFixed(3)})`);
    }
  }
  if (answer.status !== "ok" && answer.status !== "no_context") {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error("ask failed:", error);
  process.exit(1);
});
