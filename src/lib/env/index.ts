export { env, getEnv, parseEnv, resetEnvCache, type Env } from "./env";
