import { createApp } from "./app";
import { ConfigurationError, EnvConfig, loadEnv } from "./config/env";
import { createLogger } from "./config/logger";

function bootstrap(): void {
  let env: EnvConfig;
  try {
    env = loadEnv();
  } catch (error) {
    const logger = createLogger();
    if (error instanceof ConfigurationError) {
      logger.error(error.message, { remediation: error.remediation });
    } else {
      logger.error("Invalid configuration", { error: error instanceof Error ? error.message : "Unknown error" });
    }
    process.exitCode = 1;
    return;
  }

  const { app, logger } = createApp(env);
  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, nodeEnv: env.nodeEnv });
    logger.info(`LLM chat model: ${env.openaiChatModel}`);
  });
}

bootstrap();
