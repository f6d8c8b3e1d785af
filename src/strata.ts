/**
 * Strata
 *
 * Composition root: opens the workspace store and wires the graph,
 * experience, router and intelligence layers from one configuration.
 */

import { parseConfig } from './config/loader.js';
import type { StrataConfig } from './config/types.js';
import { DecayCalculator } from './decay/calculator.js';
import { ExperienceEngine } from './experience/engine.js';
import { GraphEngine } from './graph/engine.js';
import { IntelligenceLayer } from './intelligence/layer.js';
import { ContextRouter } from './router/context-router.js';
import { createStore } from './storage/factory.js';
import type { IKnowledgeStore } from './storage/interface.js';
import type { StoreStats } from './types/index.js';
import { createLogger, type Logger } from './utils/logger.js';
import { systemClock, type Clock } from './utils/time.js';

export interface StrataOptions {
  /** Defaults to built-in defaults plus environment overrides */
  config?: StrataConfig;
  /** Use an already-initialized store instead of opening config.storage */
  store?: IKnowledgeStore;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Strata instance
 */
export class Strata {
  readonly config: StrataConfig;
  readonly store: IKnowledgeStore;
  readonly logger: Logger;
  readonly graph: GraphEngine;
  readonly experiences: ExperienceEngine;
  readonly router: ContextRouter;
  readonly intelligence: IntelligenceLayer;

  private constructor(config: StrataConfig, store: IKnowledgeStore, clock: Clock, logger: Logger) {
    this.config = config;
    this.store = store;
    this.logger = logger;

    const pagination = config.pagination;
    this.graph = new GraphEngine(store, { clock, logger: logger.child('graph'), pagination });
    this.experiences = new ExperienceEngine(store, {
      clock,
      logger: logger.child('experience'),
      pagination,
      decay: new DecayCalculator(config.decay),
      promotionThreshold: config.promotion.accessThreshold,
      pruneThreshold: config.decay.pruneThreshold,
    });
    this.router = new ContextRouter(store, this.graph, {
      logger: logger.child('router'),
      minConfidence: config.router.minConfidence,
      maxKeywords: config.router.maxKeywords,
      edgeLimit: config.context.edgeLimit,
      pagination,
    });
    this.graph.addListener(this.router);
    this.intelligence = new IntelligenceLayer(
      { store, graph: this.graph, experiences: this.experiences, router: this.router },
      {
        workspace: config.workspace,
        peers: config.crossref.peers,
        busyTimeoutMs: config.storage.busyTimeoutMs,
        clock,
        logger: logger.child('intelligence'),
        pagination,
      }
    );
  }

  /**
   * Create a new Strata instance
   */
  static async create(options: StrataOptions = {}): Promise<Strata> {
    const config = options.config ?? parseConfig({});
    const logger = options.logger ?? createLogger({ level: config.log.level });
    const store =
      options.store ?? (await createStore(config.storage, { logger: logger.child('store') }));

    logger.debug('workspace opened', { workspace: config.workspace, path: config.storage.path });
    return new Strata(config, store, options.clock ?? systemClock, logger);
  }

  async status(): Promise<StoreStats & { workspace: string }> {
    const stats = await this.store.stats();
    return { workspace: this.config.workspace, ...stats };
  }

  /**
   * Close the Strata instance
   */
  async close(): Promise<void> {
    await this.store.close();
  }
}
