import mqtt, { type MqttClient } from "mqtt";
import type { InfrastructureConfig } from "@/config/tracking";
import type { TripStateMachine } from "@/services/tracking/tripStateMachine";
import { createGpsHandler } from "@/utils/gpsHandler";
import { toBuffer } from "@/utils/gps";

type MqttIngestionOptions = {
  config: InfrastructureConfig["mqtt"];
  stateMachine: Pick<TripStateMachine, "ingest">;
};

export type MqttStatus = {
  connected: boolean;
  subscribed: boolean;
  topic: string;
  lastConnectedAt: number | null;
  lastSubscribedAt: number | null;
};

export type MqttIngestion = {
  status: () => MqttStatus;
  stop: () => Promise<void>;
};

/**
 * Subscribes to `gps/{tripId}` messages and feeds them to the trip state
 * machine. Returns null when no broker is configured.
 */
export function createMqttIngestion(options: MqttIngestionOptions): MqttIngestion | null {
  const { config } = options;
  if (!config.brokerUrl) {
    return null;
  }

  const topicPrefix = config.topic.split("/")[0] || "gps";
  const handleGpsMessage = createGpsHandler({
    stateMachine: options.stateMachine,
    topicPrefix,
  });

  const state: MqttStatus = {
    connected: false,
    subscribed: false,
    topic: config.topic,
    lastConnectedAt: null,
    lastSubscribedAt: null,
  };

  const mqttClient: MqttClient = mqtt.connect(config.brokerUrl, {
    clientId: config.clientId,
    username: config.username,
    password: config.password,
    keepalive: 60,
    reconnectPeriod: 1000,
  });

  mqttClient.on("connect", () => {
    state.connected = true;
    state.lastConnectedAt = Date.now();
    console.log("[mqtt] connected", {
      broker: config.brokerUrl,
      hasPassword: Boolean(config.password),
    });
    mqttClient.subscribe(config.topic, { qos: 1 }, (error) => {
      if (error) {
        state.subscribed = false;
        console.warn("[mqtt] subscribe failed", error);
        return;
      }
      state.subscribed = true;
      state.lastSubscribedAt = Date.now();
      console.log("[mqtt] subscribed", { topic: config.topic });
    });
  });

  mqttClient.on("message", (topic, payload) => {
    void handleGpsMessage(topic, toBuffer(payload));
  });

  mqttClient.on("reconnect", () => {
    state.subscribed = false;
    console.log("[mqtt] reconnecting");
  });

  mqttClient.on("close", () => {
    state.connected = false;
    state.subscribed = false;
    console.log("[mqtt] connection closed");
  });

  mqttClient.on("error", (error) => {
    console.warn("[mqtt] error", error);
  });

  mqttClient.on("offline", () => {
    state.connected = false;
    state.subscribed = false;
    console.warn("[mqtt] offline");
  });

  return {
    status: () => ({ ...state }),
    async stop() {
      await mqttClient.endAsync();
    },
  };
}
