import type { TableDataService } from '@src/lib/table-data-service.js';

/**
 * Hono environment shared by the app and its route handlers
 */
export type AppEnv = {
    Variables: {
        tableDataService: TableDataService;
    };
};
