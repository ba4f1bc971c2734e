export const isProd = process.env.ENVIRONMENT === "prod";

export * from "./common/responseCodes";
export * from "./helpers/errorHandling";
export * from "./helpers/serializers";
export * from "./helpers/request";
