import dotenv from "dotenv";
import { createApp, listen } from "./app";
import { loadConfig } from "./config";
import { AppContextHolder, closeAppContext, createAppContext } from "./context";
import { getErrorMessage } from "./errors";

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const holder = new AppContextHolder();
  const app = createApp(holder);

  holder.attach(await createAppContext(config));

  const server = await listen(app, config.port);
  console.log(`Server listening on http://localhost:${config.port}`);

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    console.log(`${signal} received, shutting down`);
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    const context = holder.detach();
    if (context) {
      await closeAppContext(context);
    }
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error) => {
          console.error("Shutdown failed:", getErrorMessage(error));
          process.exit(1);
        }
      );
    });
  }
}

main().catch((error) => {
  console.error("Failed to start server:", getErrorMessage(error));
  process.exit(1);
});
