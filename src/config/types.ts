export type HttpConfig = {
  cors: {
    origin: string[];
    allowedHeaders: string[];
    methods: string[];
  };
  limits: {
    windowMs: number;
    max: number;
    standardHeaders: boolean;
    legacyHeaders: boolean;
  };
};
