import dotenv from "dotenv";
import { createRuntime, loadConfig } from "@fitsync/node";
import { createServer } from "./server";

const start = async () => {
  try {
    // Variables already set in the environment win over .env
    dotenv.config();

    const config = loadConfig(process.env);
    const server = await createServer(createRuntime(config));

    const shutdown = () => {
      server.close().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error("Server shutdown failed:", err);
          process.exit(1);
        }
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    await server.listen();
  } catch (err) {
    console.error("Server startup failed:", err);
    process.exit(1);
  }
};

void start();
