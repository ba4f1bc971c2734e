import dotenv from "dotenv";

dotenv.config();
import { createMongoRepositories } from "@/services/repository/mongo";
import { createMemoryStore } from "@/services/repository/memory";
import { loadSeedFile } from "@/services/repository/seed";
import type { TrackingRepositories } from "@/services/repository/types";
import {
  createInactivitySweeper,
  createKeydbVisualizationCache,
  createTrackingEngine,
  type InactivitySweeper,
  type TrackingEngine,
  type VisualizationCache,
} from "@/services/tracking";
import { createKeydbClient, pingKeydb } from "@/libs/keydb";
import { loadTrackingConfig, type TrackingConfig } from "@/config";
import { createMqttIngestion, type MqttIngestion } from "@/mqtt";
import { createServer } from "@/server";
import type Redis from "ioredis";
import mongoose from "mongoose";
import http from "http";

class App {
  static #instance: App;
  config: TrackingConfig = loadTrackingConfig();
  server: http.Server | undefined;
  engine: TrackingEngine | undefined;
  sweeper: InactivitySweeper | undefined;
  mqtt: MqttIngestion | null = null;
  keydb: Redis | null = null;
  status: "loading" | "running" | "error" | undefined = undefined;

  public static get instance(): App {
    if (!App.#instance) {
      App.#instance = new App();
    }
    return App.#instance;
  }

  async init() {
    this.status = "loading";
    try {
      const repositories = await this.connect_db();
      const engine = createTrackingEngine({
        repositories,
        rules: this.config.rules,
        cache: this.connect_cache(),
      });
      this.engine = engine;

      this.sweeper = createInactivitySweeper({
        stateMachine: engine.trips,
        cache: engine.cache,
        intervalMs: this.config.infrastructure.sweepIntervalMs,
      });
      await this.sweeper.start();

      this.mqtt = createMqttIngestion({
        config: this.config.infrastructure.mqtt,
        stateMachine: engine.trips,
      });
      await this.start_server(engine);
    } catch (error) {
      console.error("[app] failed to start", error);
      this.status = "error";
    }
  }

  async connect_db(): Promise<TrackingRepositories> {
    const { mongoConnection, seedFile } = this.config.infrastructure;
    if (mongoConnection) {
      mongoose.set("strictQuery", false);
      await mongoose.connect(mongoConnection, {
        maxPoolSize: 10,
        serverSelectionTimeoutMS: 5000,
        socketTimeoutMS: 45000,
      });
      console.log("[app] connected to mongo");
      return createMongoRepositories();
    }

    const store = createMemoryStore();
    if (seedFile) {
      const seed = await loadSeedFile(store, seedFile);
      console.log("[app] loaded seed", {
        file: seedFile,
        lines: seed.lines.length,
        buses: seed.buses.length,
        drivers: seed.drivers.length,
      });
    }
    console.warn("[app] MONGO_CONNECTION not set, using the in-memory store");
    return store;
  }

  connect_cache(): VisualizationCache | undefined {
    const { keydbUrl, keydbClientName } = this.config.infrastructure;
    if (!keydbUrl) return undefined;

    this.keydb = createKeydbClient(keydbUrl, keydbClientName);
    return createKeydbVisualizationCache({
      keydb: this.keydb,
      ttlMs: this.config.rules.visualizationTtlMs,
    });
  }

  async start_server(engine: TrackingEngine) {
    if (this.server || this.status === "running") return;

    const app = createServer(engine, {
      health: async () => ({
        database: this.config.infrastructure.mongoConnection
          ? { backend: "mongo", readyState: mongoose.connection.readyState }
          : { backend: "memory" },
        keydb: this.keydb ? await pingKeydb(this.keydb) : null,
        mqtt: this.mqtt ? this.mqtt.status() : null,
        inactivitySweep: this.sweeper ? this.sweeper.getStats() : null,
      }),
    });

    const port = this.config.infrastructure.port;
    this.server = http.createServer(app);
    this.server.keepAliveTimeout = 30 * 1000;
    this.server.headersTimeout = 35 * 1000;
    this.server.listen(port, () => {
      console.log("Server running on port " + port);
    });
    this.status = "running";
  }

  async stop_server() {
    if (this.server) this.server.close();
    if (this.sweeper) await this.sweeper.stop();
    if (this.mqtt) await this.mqtt.stop();
    if (this.keydb) await this.keydb.quit();
    if (this.config.infrastructure.mongoConnection) await mongoose.disconnect();
    this.status = undefined;
    this.server = undefined;
  }
}

const appInstance = App.instance;

if (require.main === module) {
  void appInstance.init();

  const shutdown = (signal: string) => {
    console.log(`[app] ${signal} received, shutting down`);
    appInstance
      .stop_server()
      .then(() => process.exit(0))
      .catch((error) => {
        console.error("[app] shutdown failed", error);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

export { App, appInstance };
