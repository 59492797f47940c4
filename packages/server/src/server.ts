import {
  InvalidTopologyError,
  SessionRegistry,
  WaypointGraph,
  configFromEnv,
  loadNavigationConfig,
  loadTopologyFile,
} from "@waymark/navigation";
import { createApp } from "./app.js";

const PORT = parseInt(process.env["PORT"] ?? "3000", 10);

function loadGraph(topology: string): WaypointGraph {
  try {
    return WaypointGraph.load(loadTopologyFile(topology));
  } catch (err) {
    if (err instanceof InvalidTopologyError) {
      console.error(`[error] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

const config = loadNavigationConfig(configFromEnv());
const registry = new SessionRegistry({ graph: loadGraph(config.topology), config });
const app = createApp(registry);

const server = app.listen(PORT, () => {
  console.log(`\nWaymark navigation server running at http://localhost:${PORT}`);
  console.log(`Topology "${registry.graph.name}": ${registry.graph.size} waypoints\n`);
});

function shutdown(): void {
  console.log("[server] Shutting down");
  registry.disposeAll();
  server.close();
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
