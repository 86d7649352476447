import { initFolio } from "./rag/app.js";
import { RAG_CONFIG } from "./rag/config.js";
import { errorMessage } from "./rag/errors.js";
import { createFolioServer } from "./server.js";

function log(msg: string): void {
  console.log(`[${new Date().toISOString()}] ${msg}`);
}

const apiKey = RAG_CONFIG.apiKey;
if (!apiKey) {
  console.error("Error: OPENROUTER_API_KEY environment variable is required.");
  console.error("  export OPENROUTER_API_KEY=your-key");
  process.exit(1);
}

try {
  const folio = await initFolio({ apiKey, log });
  const server = createFolioServer({ ...folio, log });

  server.listen(RAG_CONFIG.port, () => {
    log(`folio listening on http://localhost:${RAG_CONFIG.port} (agent: ${RAG_CONFIG.agent})`);
  });

  const shutdown = () => {
    log("shutting down, waiting for ingestion jobs");
    server.close();
    folio.scheduler
      .idle()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log(`shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
} catch (err) {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
}
