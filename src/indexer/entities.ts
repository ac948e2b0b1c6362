/**
 * Entity Extractor
 *
 * Asks the model for the named entities in a document excerpt. When the
 * model is unreachable or its answer is unusable, a Title-Case phrase
 * heuristic takes over, so indexing always yields some entities.
 */

import { z } from 'zod';
import type { ModelProfile } from '../config/profiles.js';
import { TransientIOError } from '../errors/index.js';
import type { KnowledgeGraph } from '../graph/knowledge-graph.js';
import type { StructuredCallResult, StructuredOutputCaller } from '../llm/structured.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export const ENTITY_TYPES = ['team', 'api', 'technology', 'service', 'compliance', 'concept'] as const;
export type EntityType = (typeof ENTITY_TYPES)[number];

export interface ExtractedEntity {
  name: string;
  type: EntityType;
}

export interface EntityExtraction {
  entities: ExtractedEntity[];
  /** 'model' when the model answered, 'fallback' when the heuristic ran */
  source: 'model' | 'fallback';
}

/** Excerpt sizes: small models see less of the document */
export const SIMPLIFIED_EXCERPT_CHARS = 2000;
export const FULL_EXCERPT_CHARS = 4000;

export const MAX_FALLBACK_ENTITIES = 20;

const EXTRACTION_MAX_OUTPUT_TOKENS = 1024;

const EXTRACTION_SYSTEM_PROMPT =
  'Extract named entities from the text. ' +
  'Focus on: team names, API names, technologies, services, ' +
  'compliance requirements, key concepts. ' +
  'Return JSON: {"entities": [{"name": "...", "type": "team|api|technology|service|compliance|concept"}]}';

function toEntityType(value: string | undefined): EntityType {
  const normalized = value?.trim().toLowerCase();
  return ENTITY_TYPES.find((type) => type === normalized) ?? 'concept';
}

const ExtractionResponseSchema = z.object({
  entities: z.array(
    z.object({
      name: z.string(),
      type: z.string().optional().transform(toEntityType),
    })
  ),
});

const STOP_PREFIXES = [
  'The',
  'This',
  'That',
  'These',
  'Those',
  'When',
  'Where',
  'With',
  'From',
  'About',
  'After',
  'Before',
];

function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, ' ');
}

function dedupeKey(name: string): string {
  return normalizeName(name).toLowerCase();
}

/**
 * Multi-word Title-Case phrases, one leading stop word removed,
 * de-duplicated case-insensitively, capped at 20, all typed `concept`.
 *
 * @example
 * regexEntityFallback('The Privacy Team approved the Data Privacy Review.')
 * // [{ name: 'Privacy Team', type: 'concept' }, { name: 'Data Privacy Review', type: 'concept' }]
 */
export function regexEntityFallback(content: string): ExtractedEntity[] {
  const entities: ExtractedEntity[] = [];
  const seen = new Set<string>();

  for (const match of content.matchAll(/\b([A-Z][a-z]+(?:\s+[A-Z][a-z]+)+)\b/g)) {
    let name = normalizeName(match[1] ?? '');
    const prefix = STOP_PREFIXES.find((word) => name.startsWith(`${word} `));
    if (prefix) {
      name = name.slice(prefix.length + 1);
    }

    const key = dedupeKey(name);
    if (!name || seen.has(key)) continue;
    seen.add(key);
    entities.push({ name, type: 'concept' });

    if (entities.length >= MAX_FALLBACK_ENTITIES) break;
  }

  return entities;
}

export interface EntityExtractorOptions {
  logger?: Logger;
}

export class EntityExtractor {
  private readonly logger: Logger;

  constructor(
    private readonly caller: StructuredOutputCaller,
    private readonly profile: ModelProfile,
    options: EntityExtractorOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  async extract(content: string): Promise<EntityExtraction> {
    const limit = this.profile.simplifyPrompts ? SIMPLIFIED_EXCERPT_CHARS : FULL_EXCERPT_CHARS;
    const excerpt = content.slice(0, limit);

    const fromModel = await this.askModel(excerpt);
    if (fromModel !== null) {
      return { entities: fromModel, source: 'model' };
    }
    return { entities: regexEntityFallback(content), source: 'fallback' };
  }

  /**
   * Extract entities and link each one to `docId` in the graph.
   */
  async extractAndLink(content: string, docId: string, graph: KnowledgeGraph): Promise<EntityExtraction> {
    const extraction = await this.extract(content);
    for (const entity of extraction.entities) {
      await graph.addEntity(entity.name, entity.type, docId);
    }
    return extraction;
  }

  private async askModel(excerpt: string): Promise<ExtractedEntity[] | null> {
    let result: StructuredCallResult;
    try {
      result = await this.caller.call(excerpt, {
        system: EXTRACTION_SYSTEM_PROMPT,
        temperature: 0,
        maxOutputTokens: EXTRACTION_MAX_OUTPUT_TOKENS,
        label: 'entities',
      });
    } catch (error) {
      if (!(error instanceof TransientIOError)) {
        throw error;
      }
      this.logger.warn(`Entity extraction call failed, using regex fallback: ${error.message}`);
      return null;
    }

    if (!result.ok) {
      this.logger.warn('Entity extraction returned no JSON, using regex fallback');
      return null;
    }

    const parsed = ExtractionResponseSchema.safeParse(result.value);
    if (!parsed.success) {
      this.logger.warn('Entity extraction returned an unexpected shape, using regex fallback');
      return null;
    }

    const entities: ExtractedEntity[] = [];
    for (const entity of parsed.data.entities) {
      const name = normalizeName(entity.name);
      if (name) {
        entities.push({ name, type: entity.type });
      }
    }
    return entities;
  }
}
