import type { HttpConfig } from "./types";

const config: HttpConfig = {
  cors: {
    origin: ["http://localhost:8080", "http://localhost:3000"],
    allowedHeaders: ["Content-Type", "Authorization"],
    methods: ["GET", "POST"],
  },
  limits: {
    windowMs: 15 * 60 * 1000,
    max: 100000,
    standardHeaders: true,
    legacyHeaders: false,
  },
};

export default config;
