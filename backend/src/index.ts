import "dotenv/config";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { log } from "./logger.js";
import { InMemoryProjectStore, ProjectLocks, type ProjectStore } from "./projectStore.js";
import { AgentEditPipeline, loggingTokenRecorder } from "./services/agentEditPipeline.js";
import { AgentEditService } from "./services/agentEditService.js";
import { createModelClient } from "./services/aiService.js";
import { FileProjectStore } from "./services/projectSaveService.js";

const config = loadConfig();
log.setLevel(config.logLevel);

if (config.model.provider !== config.model.requestedProvider) {
  log.warn(`No API key for "${config.model.requestedProvider}"; AI features run in development mode.`);
}

const client = createModelClient(config.model);
const store: ProjectStore =
  config.projectStore === "file" ? new FileProjectStore(config.dataDir) : new InMemoryProjectStore();

const pipeline = new AgentEditPipeline({
  service: new AgentEditService({ client, settings: config.model }),
  model: config.model,
  batch: config.batch,
  recorder: loggingTokenRecorder
});

const app = createApp({
  pipeline,
  store,
  locks: new ProjectLocks(),
  provider: client.provider,
  jsonBodyLimit: config.jsonBodyLimit
});

app.listen(config.port, () => {
  log.info(`Backend listening on http://localhost:${config.port}`, {
    provider: client.provider,
    store: config.projectStore
  });
});
