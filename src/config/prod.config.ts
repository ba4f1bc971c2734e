import type { HttpConfig } from "./types";

const config: HttpConfig = {
  cors: {
    origin: (process.env.CORS_ORIGINS ?? "")
      .split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    allowedHeaders: ["Content-Type", "Authorization"],
    methods: ["GET", "POST"],
  },
  limits: {
    windowMs: 15 * 60 * 1000,
    // drivers post every few seconds, riders poll arrivals
    max: 20000,
    standardHeaders: true,
    legacyHeaders: false,
  },
};

export default config;
