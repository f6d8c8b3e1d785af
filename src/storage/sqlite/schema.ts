/**
 * SQLite Schema Definition
 *
 * - nodes / edges: the knowledge graph, soft-deleted via deleted_at
 * - experiences: decaying memories with access tracking
 * - experience_links: derived-from links between nodes and experiences
 * - routes: keyword index cache
 * - nodes_fts / experiences_fts: FTS5 external-content tables kept in sync by triggers
 */

export const SCHEMA = `
CREATE TABLE IF NOT EXISTS nodes (
  seq INTEGER PRIMARY KEY,
  id TEXT NOT NULL UNIQUE,
  namespace TEXT NOT NULL DEFAULT 'knowledge',
  type TEXT NOT NULL,
  name TEXT NOT NULL,
  description TEXT,
  tags TEXT NOT NULL DEFAULT '[]',        -- JSON array
  properties TEXT NOT NULL DEFAULT '{}',  -- JSON object
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  deleted_at TEXT
);

CREATE TABLE IF NOT EXISTS edges (
  source_id TEXT NOT NULL,
  target_id TEXT NOT NULL,
  type TEXT NOT NULL,
  weight REAL NOT NULL DEFAULT 1.0 CHECK (weight >= 0 AND weight <= 1),
  properties TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  deleted_at TEXT,
  PRIMARY KEY (source_id, target_id, type),
  FOREIGN KEY (source_id) REFERENCES nodes(id),
  FOREIGN KEY (target_id) REFERENCES nodes(id)
);

CREATE TABLE IF NOT EXISTS experiences (
  seq INTEGER PRIMARY KEY,
  id TEXT NOT NULL UNIQUE,
  type TEXT NOT NULL CHECK (type IN ('solution', 'pattern', 'decision', 'workaround', 'gotcha')),
  content TEXT NOT NULL,
  context TEXT,
  confidence TEXT NOT NULL CHECK (confidence IN ('high', 'medium', 'low')),
  tags TEXT NOT NULL DEFAULT '[]',
  score REAL NOT NULL DEFAULT 1.0,
  decay_rate REAL NOT NULL,
  access_count INTEGER NOT NULL DEFAULT 0,
  needs_promotion INTEGER NOT NULL DEFAULT 0,
  promoted_to_node_id TEXT,
  created_at TEXT NOT NULL,
  last_accessed TEXT,
  FOREIGN KEY (promoted_to_node_id) REFERENCES nodes(id)
);

CREATE TABLE IF NOT EXISTS experience_links (
  node_id TEXT NOT NULL,
  experience_id TEXT NOT NULL,
  type TEXT NOT NULL DEFAULT 'derived-from',
  created_at TEXT NOT NULL,
  PRIMARY KEY (node_id, experience_id, type),
  FOREIGN KEY (node_id) REFERENCES nodes(id),
  FOREIGN KEY (experience_id) REFERENCES experiences(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS routes (
  keyword TEXT PRIMARY KEY,
  node_ids TEXT NOT NULL,  -- JSON array
  confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1)
);

CREATE VIRTUAL TABLE IF NOT EXISTS nodes_fts USING fts5(
  name, description, tags,
  content='nodes', content_rowid='seq'
);

CREATE VIRTUAL TABLE IF NOT EXISTS experiences_fts USING fts5(
  content, context, tags,
  content='experiences', content_rowid='seq'
);

CREATE TRIGGER IF NOT EXISTS nodes_ai AFTER INSERT ON nodes BEGIN
  INSERT INTO nodes_fts(rowid, name, description, tags)
  VALUES (new.seq, new.name, new.description, new.tags);
END;

CREATE TRIGGER IF NOT EXISTS nodes_ad AFTER DELETE ON nodes BEGIN
  INSERT INTO nodes_fts(nodes_fts, rowid, name, description, tags)
  VALUES ('delete', old.seq, old.name, old.description, old.tags);
END;

CREATE TRIGGER IF NOT EXISTS nodes_au AFTER UPDATE OF name, description, tags ON nodes BEGIN
  INSERT INTO nodes_fts(nodes_fts, rowid, name, description, tags)
  VALUES ('delete', old.seq, old.name, old.description, old.tags);
  INSERT INTO nodes_fts(rowid, name, description, tags)
  VALUES (new.seq, new.name, new.description, new.tags);
END;

CREATE TRIGGER IF NOT EXISTS experiences_ai AFTER INSERT ON experiences BEGIN
  INSERT INTO experiences_fts(rowid, content, context, tags)
  VALUES (new.seq, new.content, new.context, new.tags);
END;

CREATE TRIGGER IF NOT EXISTS experiences_ad AFTER DELETE ON experiences BEGIN
  INSERT INTO experiences_fts(experiences_fts, rowid, content, context, tags)
  VALUES ('delete', old.seq, old.content, old.context, old.tags);
END;

CREATE TRIGGER IF NOT EXISTS experiences_au AFTER UPDATE OF content, context, tags ON experiences BEGIN
  INSERT INTO experiences_fts(experiences_fts, rowid, content, context, tags)
  VALUES ('delete', old.seq, old.content, old.context, old.tags);
  INSERT INTO experiences_fts(rowid, content, context, tags)
  VALUES (new.seq, new.content, new.context, new.tags);
END;

CREATE INDEX IF NOT EXISTS idx_nodes_type ON nodes(type);
CREATE INDEX IF NOT EXISTS idx_nodes_namespace ON nodes(namespace);
CREATE INDEX IF NOT EXISTS idx_nodes_updated_at ON nodes(updated_at);
CREATE INDEX IF NOT EXISTS idx_edges_target ON edges(target_id);
CREATE INDEX IF NOT EXISTS idx_experiences_type ON experiences(type);
CREATE INDEX IF NOT EXISTS idx_experiences_promotion ON experiences(needs_promotion);
CREATE INDEX IF NOT EXISTS idx_experience_links_experience ON experience_links(experience_id);
`;

/**
 * Schema version, stored in PRAGMA user_version
 */
export const SCHEMA_VERSION = 1;
