export const DEFAULT_MYSQL_PORT = 3306;

export const PING_SQL = 'SELECT 1 AS ok';

export const DETAILS_SQL = `
SELECT VERSION() AS version, DATABASE() AS db, CURRENT_USER() AS user
`;

export const LOAD_TABLES_SQL = `
SELECT
  t.TABLE_NAME  AS name,
  t.TABLE_ROWS  AS row_count,
  (SELECT COUNT(*)
     FROM information_schema.COLUMNS c
    WHERE c.TABLE_SCHEMA = t.TABLE_SCHEMA
      AND c.TABLE_NAME = t.TABLE_NAME) AS col_count,
  t.CREATE_TIME AS created,
  t.UPDATE_TIME AS updated
FROM information_schema.TABLES t
WHERE t.TABLE_SCHEMA = DATABASE()
  AND t.TABLE_TYPE = 'BASE TABLE'
ORDER BY t.TABLE_NAME
`;

export const TABLE_EXISTS_SQL = `
SELECT COUNT(*) AS count
FROM information_schema.TABLES
WHERE TABLE_SCHEMA = DATABASE() AND TABLE_NAME = ?
`;
