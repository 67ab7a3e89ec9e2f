/**
 * Application entry point.
 *
 * 1. Load configuration (dotenv + env vars, see config.ts).
 * 2. Load the persisted index (or build it when BUILD_ON_START is set and
 *    none exists). A missing index is not fatal: the service starts and
 *    answers /health until a rebuild creates one.
 * 3. Serve the MCP tools over stdio (default) or, with MCP_TRANSPORT=http,
 *    serve REST endpoints and MCP streamable HTTP from one Express app.
 */
import path from "node:path";
import { getConfig } from "./config";
import { FileCorpus } from "./corpus";
import { QueryOrchestrator } from "./orchestrator";
import { statusManager } from "./status";
import { createSynthesizers } from "./synthesizers";
import { createServer } from "./tools";
import { createHttpApp, httpOptionsFromEnv, startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config = getConfig();
statusManager.setPaths(config.DATA_DIR, config.INDEX_PATH);

const corpus = new FileCorpus({
  dataDir: config.DATA_DIR,
  allowedExt: config.ALLOWED_EXT,
  excludedFolders: config.EXCLUDED_FOLDERS,
  excludeFiles: [config.INDEX_PATH],
  cacheDir: path.dirname(config.INDEX_PATH),
  verbose: config.VERBOSE,
});

const orchestrator = new QueryOrchestrator({
  indexPath: config.INDEX_PATH,
  corpus,
  synthesizers: createSynthesizers(config),
  maxFeatures: config.MAX_FEATURES,
  limits: {
    maxQueryLength: config.MAX_QUERY_LENGTH,
    maxResultsPerPage: config.MAX_RESULTS_PER_PAGE,
    defaultResultsPerPage: config.DEFAULT_RESULTS_PER_PAGE,
  },
  buildOnStart: config.BUILD_ON_START,
  verbose: config.VERBOSE,
});

await orchestrator.start();

const newServer = () => createServer(orchestrator, config.FOLDER_INFO_NAME);
const useHttp = config.MCP_TRANSPORT === "http" || config.MCP_TRANSPORT === "streamable-http";

if (useHttp) {
  statusManager.markTransport("http");
  const httpOpts = httpOptionsFromEnv();
  await startHttpTransport(createHttpApp(orchestrator, newServer, httpOpts), httpOpts);
} else {
  statusManager.markTransport("stdio");
  await startStdioTransport(newServer);
}
