import type { Logger } from '@marketsync/integrations-domain';

export type AppEnv = {
  Variables: {
    requestId: string;
    logger: Logger;
  };
};
