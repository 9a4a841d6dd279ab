import type { Logger } from "pino";

export interface AppVariables {
  requestId: string;
  logger: Logger;
  userId: string;
  isAdmin: boolean;
}

export type AppEnv = { Variables: AppVariables };
