/**
 * SQL Server Resources
 */

import type { SqlServerAdapter } from '../SqlServerAdapter.js';
import type { ResourceDefinition } from '../../../types/index.js';
import { createSchemaResource } from './schema.js';
import { createSampleResource } from './sample.js';
import { createPoolResource } from './pool.js';

export function getSqlServerResources(adapter: SqlServerAdapter): ResourceDefinition[] {
    return [
        createSchemaResource(adapter),
        createSampleResource(adapter),
        createPoolResource(adapter)
    ];
}
