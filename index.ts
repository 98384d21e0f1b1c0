import { createServer } from "http";
import "dotenv/config";

import { Server } from "socket.io";
import { loadProjectsFile, loadSettings } from "./lib/config";
import { DockerComposeAdapter } from "./lib/containers";
import { createDbHelpers, openDatabase } from "./lib/db";
import { errorMessage } from "./lib/errors";
import { SimpleGitAdapter } from "./lib/git";
import { createLogger, setLogLevel } from "./lib/logging";
import { ShoutrrrNotifier } from "./lib/notifications";
import { Orchestrator } from "./lib/orchestrator";
import { SopsSecretsAdapter } from "./lib/secrets";
import deploy from "./routes/deploy";

const logger = createLogger("server");

async function main() {
  const settings = loadSettings();
  setLogLevel(settings.logLevel);

  const db = await openDatabase(settings.databaseFile);
  const orchestrator = new Orchestrator({
    db: createDbHelpers(db),
    git: new SimpleGitAdapter({ remoteHashTtlMs: settings.remoteHashTtlMs }),
    secrets: new SopsSecretsAdapter({ ageKeyFile: settings.sopsAgeKeyFile }),
    containers: new DockerComposeAdapter(),
    notifier: new ShoutrrrNotifier(),
    options: {
      pruneImages: settings.pruneImages,
      stepTimeoutMs: settings.stepTimeoutMs,
      notifyTimeoutMs: settings.notifyTimeoutMs,
      composeProjectPrefix: settings.composeProjectPrefix,
    },
  });

  const loadProjects = () => loadProjectsFile(settings.projectsFile, settings.deploymentsRoot);
  orchestrator.sync(await loadProjects());
  orchestrator.start(settings.concurrency);
  if (settings.configReloadMs > 0) {
    orchestrator.watchConfig(loadProjects, settings.configReloadMs);
  }

  const server = createServer();
  const io = new Server(server, {cors: {origin: "*"}});

  orchestrator.setListener({
    onLog: (deploymentId, repositoryId, chunk) => io.emit("deploy:log-stream", { deploymentId, repositoryId, chunk }),
    onStatus: (deployment) => io.emit("deploy:status", deployment),
  });

  io.on("connection", (socket) => {
    logger.debug(`${socket.id}-> Client connected`);
    deploy(socket, orchestrator);

    socket.on("disconnect", () => {
      logger.debug(`${socket.id}-> Client disconnected`);
    });
  });

  server.listen(settings.port, () => {
    logger.info(`Socket.IO server running on port ${settings.port}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, waiting for running deployments`);
    await orchestrator.stop();
    io.close();
    db.close();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error("Shutdown failed:", errorMessage(error));
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  logger.error("Startup failed:", errorMessage(error));
  process.exit(1);
});
