import { join, dirname } from "path";
import { createHttpApp } from "./app.js";
import { resolvePort } from "./config/env.js";
import { resolveConfigFile, SESSION_LOG_FILE_NAME } from "./config/paths.js";
import { loadTomlConfig } from "./config/tomlFile.js";
import { createRuntime } from "./runtime.js";

async function bootstrap() {
  const configPath = resolveConfigFile();
  const config = await loadTomlConfig(configPath);
  const port = resolvePort(process.env, config.port);

  const runtime = createRuntime(config, {
    sessionLogPath: join(dirname(configPath), SESSION_LOG_FILE_NAME)
  });
  const { app, closeSessions } = createHttpApp(runtime.toolset);

  runtime.stopwatch.on("level", level => {
    console.log(`Stopwatch level changed to ${level}`);
  });

  runtime.ticker.start();
  const serverInstance = app.listen(port, () => {
    console.log(`breakwatch listening on http://localhost:${port} (config: ${configPath})`);
  });

  const shutdown = async () => {
    console.log("Shutting down breakwatch...");
    serverInstance.close();
    await closeSessions();
    await runtime.stop();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch(error => {
      console.error("Failed to shut down cleanly", error);
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

bootstrap().catch(error => {
  console.error("Failed to start breakwatch HTTP server", error);
  process.exit(1);
});
