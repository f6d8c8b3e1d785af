/**
 * SQLite Knowledge Store
 *
 * IKnowledgeStore on better-sqlite3. Calls are synchronous underneath;
 * every multi-row write is one transaction.
 */

import type {
  EdgeListOptions,
  ExperienceSearch,
  IKnowledgeStore,
  NodeSearch,
  NodeSearchResult,
  WriteOp,
} from '../interface.js';
import type { Database as DatabaseType } from 'better-sqlite3';
import type {
  Edge,
  EdgeKey,
  Experience,
  ExperienceLink,
  Node,
  RouteEntry,
  StoreStats,
} from '../../types/index.js';
import { KnowledgeError, toStoreFailure } from '../../errors/index.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { toFtsQuery } from '../../utils/keywords.js';
import { SQLiteClient, type SQLiteClientConfig } from './client.js';
import { SCHEMA, SCHEMA_VERSION } from './schema.js';
import * as Q from './queries.js';
import {
  rowToEdge,
  rowToExperience,
  rowToLink,
  rowToNode,
  rowToRoute,
  type CountRow,
  type EdgeRow,
  type ExperienceRow,
  type LinkRow,
  type NodeRow,
  type RankedNodeRow,
  type RouteRow,
} from './rows.js';

export interface SQLiteStoreOptions extends Omit<SQLiteClientConfig, 'dbPath'> {
  logger?: Logger;
}

function openClient(config: SQLiteClientConfig): SQLiteClient {
  try {
    return new SQLiteClient(config);
  } catch (err) {
    throw toStoreFailure(err);
  }
}

/** Run a synchronous store call, mapping driver errors to StoreFailure */
async function wrap<T>(fn: () => T): Promise<T> {
  try {
    return fn();
  } catch (err) {
    throw toStoreFailure(err);
  }
}

/**
 * SQLite implementation of the knowledge store
 */
export class SQLiteKnowledgeStore implements IKnowledgeStore {
  private client: SQLiteClient;
  private readonly logger: Logger;

  constructor(dbPath: string, options: SQLiteStoreOptions = {}) {
    const { logger, ...clientConfig } = options;
    this.logger = logger ?? silentLogger;
    this.client = openClient({ dbPath, ...clientConfig });
  }

  get readOnly(): boolean {
    return this.client.readOnly;
  }

  private get db(): DatabaseType {
    return this.client.database;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  async initialize(): Promise<void> {
    return wrap(() => {
      const version = this.client.userVersion;
      if (version > SCHEMA_VERSION) {
        throw new KnowledgeError(
          'StoreFailure',
          `Database schema version ${version} is newer than supported version ${SCHEMA_VERSION}`
        );
      }
      if (this.client.readOnly) {
        if (version === 0) {
          throw new KnowledgeError('StoreFailure', `Not an initialized workspace: ${this.client.path}`);
        }
        return;
      }
      if (version < SCHEMA_VERSION) {
        this.client.transaction(() => {
          this.client.exec(SCHEMA);
          this.client.userVersion = SCHEMA_VERSION;
        });
        this.logger.debug('schema applied', { from: version, to: SCHEMA_VERSION });
      }
    });
  }

  async close(): Promise<void> {
    if (this.client.isOpen) this.client.close();
  }

  async applyBatch(ops: WriteOp[]): Promise<void> {
    return wrap(() => {
      this.client.transaction(() => {
        for (const op of ops) this.applyOp(op);
      });
    });
  }

  private applyOp(op: WriteOp): void {
    switch (op.kind) {
      case 'insertNode':
        this.insertNodeSync(op.node);
        return;
      case 'insertExperience':
        this.insertExperienceSync(op.experience);
        return;
      case 'linkExperience':
        this.db
          .prepare<[string, string, string, string]>(Q.INSERT_LINK)
          .run(op.link.nodeId, op.link.experienceId, op.link.type, op.link.createdAt);
        return;
      case 'markPromoted': {
        const result = this.db
          .prepare<[string, string]>(Q.MARK_PROMOTED)
          .run(op.nodeId, op.experienceId);
        if (result.changes === 0) {
          throw new KnowledgeError(
            'Conflict',
            `Experience ${op.experienceId} is missing or already promoted`
          );
        }
        return;
      }
    }
  }

  // ==========================================================================
  // Nodes
  // ==========================================================================

  private insertNodeSync(node: Node): void {
    this.db
      .prepare<[string, string, string, string, string | null, string, string, string, string, string | null]>(
        Q.INSERT_NODE
      )
      .run(
        node.id,
        node.namespace,
        node.type,
        node.name,
        node.description,
        JSON.stringify(node.tags),
        JSON.stringify(node.properties),
        node.createdAt,
        node.updatedAt,
        node.deletedAt
      );
  }

  async insertNode(node: Node): Promise<void> {
    return wrap(() => this.insertNodeSync(node));
  }

  async getNode(id: string, options: { includeDeleted?: boolean } = {}): Promise<Node | null> {
    return wrap(() => {
      const sql = options.includeDeleted ? Q.GET_NODE : Q.GET_LIVE_NODE;
      const row = this.db.prepare<[string], NodeRow>(sql).get(id);
      return row ? rowToNode(row) : null;
    });
  }

  async getNodes(ids: string[]): Promise<Node[]> {
    if (ids.length === 0) return [];
    return wrap(() => {
      const stmt = this.db.prepare<[string], NodeRow>(Q.GET_LIVE_NODE);
      const nodes: Node[] = [];
      for (const id of ids) {
        const row = stmt.get(id);
        if (row) nodes.push(rowToNode(row));
      }
      return nodes;
    });
  }

  async listLiveNodes(): Promise<Node[]> {
    return wrap(() => this.db.prepare<[], NodeRow>(Q.LIST_LIVE_NODES).all().map(rowToNode));
  }

  async searchNodes(search: NodeSearch): Promise<NodeSearchResult> {
    return wrap(() => {
      let filters = '';
      const filterParams: string[] = [];
      if (search.type) {
        filters += ' AND n.type = ?';
        filterParams.push(search.type);
      }
      if (search.namespace) {
        filters += ' AND n.namespace = ?';
        filterParams.push(search.namespace);
      }
      for (const tag of search.tags ?? []) {
        filters += ' AND EXISTS (SELECT 1 FROM json_each(n.tags) WHERE json_each.value = ?)';
        filterParams.push(tag);
      }

      if (search.text === undefined || search.text.trim() === '') {
        const rows = this.db
          .prepare<unknown[], RankedNodeRow>(
            `${Q.SELECT_NODES}${filters} ${Q.ORDER_NODES_BY_RECENCY} LIMIT ? OFFSET ?`
          )
          .all(...filterParams, search.limit, search.offset);
        return { hits: rows.map((row) => ({ node: rowToNode(row), rank: null })), bestRank: null };
      }

      const match = toFtsQuery(search.text);
      if (match === null) return { hits: [], bestRank: null };

      const rows = this.db
        .prepare<unknown[], RankedNodeRow>(
          `${Q.SEARCH_NODES}${filters} ORDER BY bm25(nodes_fts), n.updated_at DESC, n.id LIMIT ? OFFSET ?`
        )
        .all(match, ...filterParams, search.limit, search.offset);
      const best = this.db
        .prepare<unknown[], { rank: number }>(`${Q.BEST_NODE_RANK}${filters} ORDER BY bm25(nodes_fts) LIMIT 1`)
        .get(match, ...filterParams);

      return {
        hits: rows.map((row) => ({ node: rowToNode(row), rank: row.rank })),
        bestRank: best ? best.rank : null,
      };
    });
  }

  async softDeleteNode(id: string, at: string): Promise<boolean> {
    return wrap(() => this.db.prepare<[string, string, string]>(Q.SOFT_DELETE_NODE).run(at, at, id).changes > 0);
  }

  async restoreNode(id: string, at: string): Promise<boolean> {
    return wrap(() => this.db.prepare<[string, string]>(Q.RESTORE_NODE).run(at, id).changes > 0);
  }

  // ==========================================================================
  // Edges
  // ==========================================================================

  async upsertEdge(edge: Edge): Promise<Edge> {
    return wrap(() =>
      this.client.transaction(() => {
        const liveNode = this.db.prepare<[string], NodeRow>(Q.GET_LIVE_NODE);
        for (const id of [edge.sourceId, edge.targetId]) {
          if (!liveNode.get(id)) {
            throw new KnowledgeError('NotFound', `Node not found: ${id}`);
          }
        }
        this.db
          .prepare<[string, string, string, number, string, string, string]>(Q.UPSERT_EDGE)
          .run(
            edge.sourceId,
            edge.targetId,
            edge.type,
            edge.weight,
            JSON.stringify(edge.properties),
            edge.createdAt,
            edge.updatedAt
          );
        const row = this.db
          .prepare<[string, string, string], EdgeRow>(Q.GET_EDGE)
          .get(edge.sourceId, edge.targetId, edge.type);
        if (!row) {
          throw new KnowledgeError('StoreFailure', 'Edge vanished after upsert');
        }
        return rowToEdge(row);
      })
    );
  }

  async getEdge(key: EdgeKey, options: { includeDeleted?: boolean } = {}): Promise<Edge | null> {
    return wrap(() => {
      const sql = options.includeDeleted ? Q.GET_EDGE : Q.GET_VISIBLE_EDGE;
      const row = this.db
        .prepare<[string, string, string], EdgeRow>(sql)
        .get(key.sourceId, key.targetId, key.type);
      return row ? rowToEdge(row) : null;
    });
  }

  async listEdges(nodeId: string, options: EdgeListOptions): Promise<Edge[]> {
    return wrap(() => {
      let sql = Q.LIST_EDGES;
      const params: Array<string | number> = [];
      switch (options.direction) {
        case 'out':
          sql += ' AND e.source_id = ?';
          params.push(nodeId);
          break;
        case 'in':
          sql += ' AND e.target_id = ?';
          params.push(nodeId);
          break;
        case 'both':
          sql += ' AND (e.source_id = ? OR e.target_id = ?)';
          params.push(nodeId, nodeId);
          break;
      }
      if (options.type) {
        sql += ' AND e.type = ?';
        params.push(options.type);
      }
      // Heaviest first, then by the id of the node at the other end
      sql += ' ORDER BY e.weight DESC, CASE WHEN e.source_id = ? THEN e.target_id ELSE e.source_id END, e.type';
      params.push(nodeId);
      if (options.limit !== undefined) {
        sql += ' LIMIT ?';
        params.push(options.limit);
      }
      return this.db.prepare<unknown[], EdgeRow>(sql).all(...params).map(rowToEdge);
    });
  }

  async softDeleteEdge(key: EdgeKey, at: string): Promise<boolean> {
    return wrap(
      () =>
        this.db
          .prepare<[string, string, string, string, string]>(Q.SOFT_DELETE_EDGE)
          .run(at, at, key.sourceId, key.targetId, key.type).changes > 0
    );
  }

  async restoreEdge(key: EdgeKey, at: string): Promise<boolean> {
    return wrap(
      () =>
        this.db
          .prepare<[string, string, string, string]>(Q.RESTORE_EDGE)
          .run(at, key.sourceId, key.targetId, key.type).changes > 0
    );
  }

  // ==========================================================================
  // Experiences
  // ==========================================================================

  private insertExperienceSync(e: Experience): void {
    this.db
      .prepare<
        [string, string, string, string | null, string, string, number, number, number, number, string | null, string, string | null]
      >(Q.INSERT_EXPERIENCE)
      .run(
        e.id,
        e.type,
        e.content,
        e.context,
        e.confidence,
        JSON.stringify(e.tags),
        e.score,
        e.decayRate,
        e.accessCount,
        e.needsPromotion ? 1 : 0,
        e.promotedToNodeId,
        e.createdAt,
        e.lastAccessed
      );
  }

  async insertExperience(experience: Experience): Promise<void> {
    return wrap(() => this.insertExperienceSync(experience));
  }

  async getExperience(id: string): Promise<Experience | null> {
    return wrap(() => {
      const row = this.db.prepare<[string], ExperienceRow>(Q.GET_EXPERIENCE).get(id);
      return row ? rowToExperience(row) : null;
    });
  }

  async findExperiences(search: ExperienceSearch): Promise<Experience[]> {
    return wrap(() => {
      const params: string[] = [];
      let sql: string;
      if (search.text !== undefined && search.text.trim() !== '') {
        const match = toFtsQuery(search.text);
        if (match === null) return [];
        sql = Q.SEARCH_EXPERIENCES;
        params.push(match);
      } else {
        sql = Q.SELECT_EXPERIENCES;
      }
      if (search.type) {
        sql += ' AND x.type = ?';
        params.push(search.type);
      }
      sql += ' ORDER BY x.created_at DESC, x.id';
      return this.db.prepare<unknown[], ExperienceRow>(sql).all(...params).map(rowToExperience);
    });
  }

  async recordAccess(ids: string[], at: string, threshold: number): Promise<Experience[]> {
    if (ids.length === 0) return [];
    return wrap(() =>
      this.client.transaction(() => {
        const stmt = this.db.prepare<[string, number, string], ExperienceRow>(Q.RECORD_ACCESS);
        const updated: Experience[] = [];
        for (const id of ids) {
          const row = stmt.get(at, threshold, id);
          if (row) updated.push(rowToExperience(row));
        }
        return updated;
      })
    );
  }

  async deleteExperiences(ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;
    return wrap(() =>
      this.client.transaction(() => {
        const stmt = this.db.prepare<[string]>(Q.DELETE_EXPERIENCE);
        let removed = 0;
        for (const id of ids) removed += stmt.run(id).changes;
        return removed;
      })
    );
  }

  async getLinks(filter: { nodeId?: string; experienceId?: string }): Promise<ExperienceLink[]> {
    return wrap(() => {
      let sql = Q.SELECT_LINKS;
      const params: string[] = [];
      if (filter.nodeId) {
        sql += ' AND node_id = ?';
        params.push(filter.nodeId);
      }
      if (filter.experienceId) {
        sql += ' AND experience_id = ?';
        params.push(filter.experienceId);
      }
      sql += ' ORDER BY created_at, node_id, experience_id';
      return this.db.prepare<unknown[], LinkRow>(sql).all(...params).map(rowToLink);
    });
  }

  // ==========================================================================
  // Routes
  // ==========================================================================

  async getRoutes(keywords: string[]): Promise<RouteEntry[]> {
    if (keywords.length === 0) return [];
    return wrap(() => this.selectRoutes(keywords));
  }

  async addRouteNode(
    keywords: string[],
    nodeId: string,
    confidenceFor: (df: number) => number
  ): Promise<RouteEntry[]> {
    if (keywords.length === 0) return [];
    return wrap(() =>
      this.client.transaction(() => {
        const existing = new Map(this.selectRoutes(keywords).map((e) => [e.keyword, e]));
        const updated = keywords.map((keyword) => {
          const nodeIds = [...(existing.get(keyword)?.nodeIds ?? [])];
          if (!nodeIds.includes(nodeId)) nodeIds.push(nodeId);
          return { keyword, nodeIds, confidence: confidenceFor(nodeIds.length) };
        });
        this.writeRoutes(updated);
        return updated;
      })
    );
  }

  async removeRouteNode(nodeId: string, confidenceFor: (df: number) => number): Promise<RouteEntry[]> {
    return wrap(() =>
      this.client.transaction(() => {
        const updated = this.db
          .prepare<[string], RouteRow>(Q.FIND_ROUTES_BY_NODE)
          .all(nodeId)
          .map(rowToRoute)
          .map((entry) => {
            const nodeIds = entry.nodeIds.filter((id) => id !== nodeId);
            return { keyword: entry.keyword, nodeIds, confidence: confidenceFor(nodeIds.length) };
          });
        this.writeRoutes(updated);
        return updated;
      })
    );
  }

  async replaceRoutes(entries: RouteEntry[]): Promise<void> {
    return wrap(() => {
      this.client.transaction(() => {
        this.db.prepare(Q.CLEAR_ROUTES).run();
        const upsert = this.db.prepare<[string, string, number]>(Q.UPSERT_ROUTE);
        for (const entry of entries) {
          if (entry.nodeIds.length > 0) {
            upsert.run(entry.keyword, JSON.stringify(entry.nodeIds), entry.confidence);
          }
        }
      });
    });
  }

  private selectRoutes(keywords: string[]): RouteEntry[] {
    const placeholders = keywords.map(() => '?').join(', ');
    return this.db
      .prepare<string[], RouteRow>(
        `SELECT keyword, node_ids, confidence FROM routes WHERE keyword IN (${placeholders}) ORDER BY keyword`
      )
      .all(...keywords)
      .map(rowToRoute);
  }

  /** Caller holds the transaction; entries with no node ids are removed */
  private writeRoutes(entries: RouteEntry[]): void {
    const upsert = this.db.prepare<[string, string, number]>(Q.UPSERT_ROUTE);
    const remove = this.db.prepare<[string]>(Q.DELETE_ROUTE);
    for (const entry of entries) {
      if (entry.nodeIds.length === 0) {
        remove.run(entry.keyword);
      } else {
        upsert.run(entry.keyword, JSON.stringify(entry.nodeIds), entry.confidence);
      }
    }
  }

  // ==========================================================================
  // Stats
  // ==========================================================================

  async stats(): Promise<StoreStats> {
    return wrap(() => {
      const perNamespaceCounts: Record<string, number> = {};
      let nodeCount = 0;
      const namespaces = this.db
        .prepare<[], { namespace: string; count: number }>(Q.COUNT_LIVE_NODES_BY_NAMESPACE)
        .all();
      for (const row of namespaces) {
        perNamespaceCounts[row.namespace] = row.count;
        nodeCount += row.count;
      }
      const edges = this.db.prepare<[], CountRow>(Q.COUNT_VISIBLE_EDGES).get();
      const experiences = this.db
        .prepare<[], { count: number; promoted: number }>(Q.COUNT_EXPERIENCES)
        .get();
      const routes = this.db.prepare<[], CountRow>(Q.COUNT_ROUTES).get();

      return {
        nodeCount,
        edgeCount: edges?.count ?? 0,
        perNamespaceCounts,
        experienceCount: experiences?.count ?? 0,
        promotedExperienceCount: experiences?.promoted ?? 0,
        routeCount: routes?.count ?? 0,
      };
    });
  }
}
