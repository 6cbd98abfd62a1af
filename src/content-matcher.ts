// Wellness Retention Engine - Goal-to-content matching
//
// At startup every catalog item is embedded and added to a flat L2 index.
// A goal is embedded with the same model and the nearest items are returned,
// scored as 1 / (1 + squared L2 distance) so that an exact match scores 1.

import { embeddingText } from "./content-catalog.js";
import type { EmbeddingsClient } from "./openai-clients.js";
import { DEFAULT_EMBEDDING_MODEL } from "./openai-clients.js";
import type {
  ContentIndexStatus,
  ContentItem,
  GoalMatchResponse,
  MatchedContent,
  ServiceLogger,
} from "./types.js";
import { createConsoleLogger } from "./utils.js";
import { FlatL2Index } from "./vector-index.js";

export const DEFAULT_MATCH_LIMIT = 5;

/** Max inputs per embeddings request. */
const EMBEDDING_BATCH_SIZE = 100;

export interface ContentMatcherOptions {
  client: EmbeddingsClient;
  catalog: readonly ContentItem[];
  model?: string;
  logger?: ServiceLogger;
  batchSize?: number;
}

export function similarityFromDistance(distance: number): number {
  return 1 / (1 + distance);
}

export class ContentMatcher {
  private readonly client: EmbeddingsClient;
  private readonly catalog: readonly ContentItem[];
  private readonly index: FlatL2Index;
  private readonly model: string;
  private readonly logger: ServiceLogger;

  private constructor(
    client: EmbeddingsClient,
    catalog: readonly ContentItem[],
    index: FlatL2Index,
    model: string,
    logger: ServiceLogger,
  ) {
    this.client = client;
    this.catalog = catalog;
    this.index = index;
    this.model = model;
    this.logger = logger;
  }

  /**
   * Embeds the catalog and builds the index. Fails if the catalog is empty or
   * the embedding service returns inconsistent vectors.
   */
  static async create(options: ContentMatcherOptions): Promise<ContentMatcher> {
    const {
      client,
      catalog,
      model = DEFAULT_EMBEDDING_MODEL,
      logger = createConsoleLogger("ContentMatcher"),
      batchSize = EMBEDDING_BATCH_SIZE,
    } = options;

    if (catalog.length === 0) {
      throw new Error("No content data available");
    }

    const texts = catalog.map(embeddingText);
    const step = Math.max(1, Math.floor(batchSize));
    const embeddings: number[][] = [];
    for (let start = 0; start < texts.length; start += step) {
      const batch = texts.slice(start, start + step);
      const vectors = await client.embed(model, batch);
      if (vectors.length !== batch.length) {
        throw new Error(`Embedding service returned ${vectors.length} vectors for ${batch.length} inputs`);
      }
      embeddings.push(...vectors);
    }

    const dimension = embeddings[0].length;
    if (dimension === 0) {
      throw new Error("Embedding service returned empty vectors");
    }
    const index = new FlatL2Index(dimension);
    index.add(embeddings);

    logger.info(`Built content index with ${index.size} embeddings (model ${model}, dimension ${dimension})`);
    return new ContentMatcher(client, catalog, index, model, logger);
  }

  async matchGoal(goal: string, limit: number = DEFAULT_MATCH_LIMIT): Promise<GoalMatchResponse> {
    if (!this.isReady()) {
      throw new Error("Content index not ready");
    }

    const [goalEmbedding] = await this.client.embed(this.model, [goal]);
    if (goalEmbedding === undefined) {
      throw new Error("Embedding service returned no vector for the goal");
    }

    const hits = this.index.search(goalEmbedding, Math.min(limit, this.index.size));
    const matched: MatchedContent[] = hits.map(({ index, distance }) => {
      const item = this.catalog[index];
      return {
        id: item.id,
        title: item.title,
        description: item.description,
        category: item.category,
        similarity_score: similarityFromDistance(distance),
      };
    });

    this.logger.info(`Found ${matched.length} matches for goal`);
    return {
      user_goal: goal,
      matched_content: matched,
      total_results: matched.length,
    };
  }

  isReady(): boolean {
    return this.catalog.length > 0 && this.index.size > 0;
  }

  getIndexStatus(): ContentIndexStatus {
    return {
      content_items_loaded: this.catalog.length,
      embedding_model: this.model,
      embedding_dimension: this.index.dimension,
      embeddings_count: this.index.size,
      fully_ready: this.isReady(),
    };
  }
}
