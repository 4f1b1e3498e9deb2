import "dotenv/config";
import path from "path";
import { BenchController, loadConfig, loadFleet } from "@benchfleet/orchestrator";
import { createApp } from "./app";

const repoRoot = path.resolve(__dirname, "..", "..", "..");
const gamesDir = path.resolve(process.env.BENCHFLEET_GAMES_DIR ?? path.join(repoRoot, "config", "games"));
const config = loadConfig(process.env.BENCHFLEET_CONFIG);

const controller = new BenchController({ config });

const fleetPath = process.env.BENCHFLEET_FLEET;
if (fleetPath) {
  for (const { sut } of loadFleet(fleetPath, config.agent.defaultPort).suts) {
    controller.registerSut(sut);
  }
}

const app = createApp(controller, { gamesDir });

const port = Number(process.env.PORT ?? 8787);
const server = app.listen(port, () => {
  console.log(`UI server listening on http://localhost:${port}`);
});

process.once("SIGINT", () => {
  server.close();
  controller.shutdown().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
});
