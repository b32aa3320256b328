/**
 * @toolgate/backend-sql
 *
 * Backend client for kind "sql" (MySQL).
 */

import { validateInput, type BackendClientFactory } from '@toolgate/core';
import { SqlBackendClient, SqlConnectionConfigSchema } from './client.js';

export {
  SqlBackendClient,
  SqlConnectionConfigSchema,
  READ_ONLY_ERROR,
  type SqlBackendClientOptions,
  type SqlConnectionConfig,
  type SqlCredentials,
} from './client.js';
export { SQL_TOOLS } from './tools.js';
export { isSelectStatement, isValidIdentifier } from './statements.js';

export const SQL_BACKEND_KIND = 'sql';

/**
 * Factory registered for kind "sql"
 *
 * @throws ValidationError if the connection config is malformed
 */
export const createSqlBackendClient: BackendClientFactory = ({ connection, credentials, settings }) => {
  const config = validateInput(SqlConnectionConfigSchema, connection.config, 'sql connection config');

  return new SqlBackendClient({
    name: connection.name,
    config,
    credentials: {
      username: credentials['username'],
      password: credentials['password'],
    },
    settings: settings.sql,
  });
};
