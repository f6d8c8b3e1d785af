/**
 * SQLite Prepared Statements
 */

const NODE_COLUMNS = `n.id, n.namespace, n.type, n.name, n.description, n.tags, n.properties,
  n.created_at, n.updated_at, n.deleted_at`;

// ============================================================================
// Nodes
// ============================================================================

export const INSERT_NODE = `
  INSERT INTO nodes (id, namespace, type, name, description, tags, properties, created_at, updated_at, deleted_at)
  VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
`;

export const GET_NODE = `SELECT ${NODE_COLUMNS} FROM nodes n WHERE n.id = ?`;

export const GET_LIVE_NODE = `SELECT ${NODE_COLUMNS} FROM nodes n WHERE n.id = ? AND n.deleted_at IS NULL`;

export const LIST_LIVE_NODES = `
  SELECT ${NODE_COLUMNS} FROM nodes n
  WHERE n.deleted_at IS NULL
  ORDER BY n.seq
`;

/** Filter-only search; the WHERE tail is appended by the caller */
export const SELECT_NODES = `SELECT ${NODE_COLUMNS}, NULL AS rank FROM nodes n WHERE n.deleted_at IS NULL`;

export const ORDER_NODES_BY_RECENCY = `ORDER BY n.updated_at DESC, n.created_at DESC, n.id`;

/** Full-text search; the WHERE tail is appended by the caller */
export const SEARCH_NODES = `
  SELECT ${NODE_COLUMNS}, bm25(nodes_fts) AS rank
  FROM nodes_fts
  JOIN nodes n ON n.seq = nodes_fts.rowid
  WHERE nodes_fts MATCH ? AND n.deleted_at IS NULL
`;

export const BEST_NODE_RANK = `
  SELECT bm25(nodes_fts) AS rank
  FROM nodes_fts
  JOIN nodes n ON n.seq = nodes_fts.rowid
  WHERE nodes_fts MATCH ? AND n.deleted_at IS NULL
`;

export const SOFT_DELETE_NODE = `
  UPDATE nodes SET deleted_at = ?, updated_at = ? WHERE id = ? AND deleted_at IS NULL
`;

export const RESTORE_NODE = `
  UPDATE nodes SET deleted_at = NULL, updated_at = ? WHERE id = ? AND deleted_at IS NOT NULL
`;

export const COUNT_LIVE_NODES_BY_NAMESPACE = `
  SELECT namespace, COUNT(*) AS count FROM nodes WHERE deleted_at IS NULL GROUP BY namespace
`;

// ============================================================================
// Edges
// ============================================================================

const EDGE_COLUMNS = `e.source_id, e.target_id, e.type, e.weight, e.properties,
  e.created_at, e.updated_at, e.deleted_at`;

/** Edge plus both endpoints live */
const VISIBLE_EDGE = `
  e.deleted_at IS NULL
  AND EXISTS (SELECT 1 FROM nodes s WHERE s.id = e.source_id AND s.deleted_at IS NULL)
  AND EXISTS (SELECT 1 FROM nodes t WHERE t.id = e.target_id AND t.deleted_at IS NULL)
`;

export const UPSERT_EDGE = `
  INSERT INTO edges (source_id, target_id, type, weight, properties, created_at, updated_at, deleted_at)
  VALUES (?, ?, ?, ?, ?, ?, ?, NULL)
  ON CONFLICT (source_id, target_id, type) DO UPDATE SET
    weight = excluded.weight,
    properties = excluded.properties,
    updated_at = excluded.updated_at,
    deleted_at = NULL
`;

export const GET_EDGE = `
  SELECT ${EDGE_COLUMNS} FROM edges e
  WHERE e.source_id = ? AND e.target_id = ? AND e.type = ?
`;

export const GET_VISIBLE_EDGE = `${GET_EDGE} AND ${VISIBLE_EDGE}`;

/** Visible edges touching a node; the direction clause is appended by the caller */
export const LIST_EDGES = `SELECT ${EDGE_COLUMNS} FROM edges e WHERE ${VISIBLE_EDGE}`;

export const SOFT_DELETE_EDGE = `
  UPDATE edges SET deleted_at = ?, updated_at = ?
  WHERE source_id = ? AND target_id = ? AND type = ? AND deleted_at IS NULL
`;

export const RESTORE_EDGE = `
  UPDATE edges SET deleted_at = NULL, updated_at = ?
  WHERE source_id = ? AND target_id = ? AND type = ? AND deleted_at IS NOT NULL
`;

export const COUNT_VISIBLE_EDGES = `SELECT COUNT(*) AS count FROM edges e WHERE ${VISIBLE_EDGE}`;

// ============================================================================
// Experiences
// ============================================================================

const EXPERIENCE_COLUMNS = `x.id, x.type, x.content, x.context, x.confidence, x.tags, x.score,
  x.decay_rate, x.access_count, x.needs_promotion, x.promoted_to_node_id, x.created_at, x.last_accessed`;

export const INSERT_EXPERIENCE = `
  INSERT INTO experiences (
    id, type, content, context, confidence, tags, score, decay_rate,
    access_count, needs_promotion, promoted_to_node_id, created_at, last_accessed
  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
`;

export const GET_EXPERIENCE = `SELECT ${EXPERIENCE_COLUMNS} FROM experiences x WHERE x.id = ?`;

export const SELECT_EXPERIENCES = `SELECT ${EXPERIENCE_COLUMNS} FROM experiences x WHERE 1 = 1`;

export const SEARCH_EXPERIENCES = `
  SELECT ${EXPERIENCE_COLUMNS}
  FROM experiences_fts
  JOIN experiences x ON x.seq = experiences_fts.rowid
  WHERE experiences_fts MATCH ?
`;

/**
 * One access: bump the count, stamp last_accessed and raise the promotion
 * flag once the new count reaches the threshold on an unpromoted row.
 */
export const RECORD_ACCESS = `
  UPDATE experiences SET
    access_count = access_count + 1,
    last_accessed = ?,
    needs_promotion = CASE
      WHEN access_count + 1 >= ? AND promoted_to_node_id IS NULL THEN 1
      ELSE needs_promotion
    END
  WHERE id = ?
  RETURNING id, type, content, context, confidence, tags, score, decay_rate, access_count,
    needs_promotion, promoted_to_node_id, created_at, last_accessed
`;

/** Exactly-once promotion gate */
export const MARK_PROMOTED = `
  UPDATE experiences SET promoted_to_node_id = ?, needs_promotion = 0
  WHERE id = ? AND promoted_to_node_id IS NULL
`;

export const DELETE_EXPERIENCE = `DELETE FROM experiences WHERE id = ?`;

export const COUNT_EXPERIENCES = `
  SELECT COUNT(*) AS count, COUNT(promoted_to_node_id) AS promoted FROM experiences
`;

// ============================================================================
// Experience links
// ============================================================================

export const INSERT_LINK = `
  INSERT INTO experience_links (node_id, experience_id, type, created_at) VALUES (?, ?, ?, ?)
`;

export const SELECT_LINKS = `
  SELECT node_id, experience_id, type, created_at FROM experience_links WHERE 1 = 1
`;

// ============================================================================
// Routes
// ============================================================================

export const UPSERT_ROUTE = `
  INSERT INTO routes (keyword, node_ids, confidence) VALUES (?, ?, ?)
  ON CONFLICT (keyword) DO UPDATE SET node_ids = excluded.node_ids, confidence = excluded.confidence
`;

export const DELETE_ROUTE = `DELETE FROM routes WHERE keyword = ?`;

export const CLEAR_ROUTES = `DELETE FROM routes`;

export const FIND_ROUTES_BY_NODE = `
  SELECT keyword, node_ids, confidence FROM routes
  WHERE EXISTS (SELECT 1 FROM json_each(routes.node_ids) WHERE json_each.value = ?)
  ORDER BY keyword
`;

export const COUNT_ROUTES = `SELECT COUNT(*) AS count FROM routes`;
