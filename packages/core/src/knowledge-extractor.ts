import { z } from "zod";
import { ValidationError, errorMessage } from "@docweave/errors";
import { createChildLogger, createSilentLogger } from "@docweave/logger";
import type { Logger } from "@docweave/logger";
import type {
  ExtractedEntity,
  GraphSchema,
  InferredSchema,
  KnowledgeExtraction,
  ProviderName,
} from "@docweave/types";

/** Schema used whenever the model cannot propose one. */
export const FALLBACK_SCHEMA: GraphSchema = {
  nodeLabels: ["Entity", "Concept"],
  relationshipTypes: ["RELATED_TO", "MENTIONS"],
};

export const DEFAULT_SAMPLE_LENGTH = 4000;
export const MIN_SAMPLE_LENGTH = 50;
export const MAX_SAMPLE_LENGTH = 2000;

export interface SampleOptions {
  /** Absolute sample size in characters, 50 to 2000. */
  maxSampleLength?: number;
  /** Share of the text to sample, above 0 and up to 100. */
  samplePercentage?: number;
}

/**
 * Picks the leading part of `text` used for schema inference.
 *
 * When both options are given, `maxSampleLength` wins and `samplePercentage`
 * is ignored. A percentage sample is never shorter than 50 characters.
 */
export function selectSample(text: string, options: SampleOptions = {}): string {
  const { maxSampleLength, samplePercentage } = options;

  if (maxSampleLength !== undefined) {
    if (
      !Number.isInteger(maxSampleLength) ||
      maxSampleLength < MIN_SAMPLE_LENGTH ||
      maxSampleLength > MAX_SAMPLE_LENGTH
    ) {
      throw new ValidationError("Invalid sample length", {
        maxSampleLength: `must be an integer between ${String(MIN_SAMPLE_LENGTH)} and ${String(MAX_SAMPLE_LENGTH)}`,
      });
    }
    return text.slice(0, maxSampleLength);
  }

  if (samplePercentage !== undefined) {
    if (!Number.isFinite(samplePercentage) || samplePercentage <= 0 || samplePercentage > 100) {
      throw new ValidationError("Invalid sample percentage", {
        samplePercentage: "must be greater than 0 and at most 100",
      });
    }
    const length = Math.max(MIN_SAMPLE_LENGTH, Math.round((text.length * samplePercentage) / 100));
    return text.slice(0, length);
  }

  return text.slice(0, DEFAULT_SAMPLE_LENGTH);
}

const schemaResponse = z.object({
  node_labels: z.array(z.string().trim().min(1)).min(1),
  relationship_types: z.array(z.string().trim().min(1)).min(1),
});

const extractionResponse = z.object({
  entities: z
    .array(z.object({ label: z.string().trim().min(1), name: z.string().trim().min(1) }))
    .default([]),
  relationships: z
    .array(
      z.object({
        source: z.string().trim().min(1),
        target: z.string().trim().min(1),
        type: z.string().trim().min(1),
      }),
    )
    .default([]),
});

/** The slice of the embedding gateway the extractor talks to. */
export interface TextGenerator {
  generateText(
    prompt: string,
    options?: { provider?: ProviderName; format?: "json"; signal?: AbortSignal },
  ): Promise<string>;
}

export interface ExtractionCallOptions {
  provider?: ProviderName;
  signal?: AbortSignal;
}

function schemaPrompt(sample: string): string {
  return [
    "You are a data modeler designing a property graph.",
    "Read the text below and propose a generic schema for it: the kinds of entities it talks about",
    "(node labels such as \"Person\" or \"Company\") and the kinds of relationships between them",
    "(relationship types such as \"WORKS_AT\" or \"INVESTED_IN\").",
    "Do not extract the data itself, only the schema.",
    "",
    'Answer with one JSON object with the keys "node_labels" and "relationship_types", both lists of strings.',
    "",
    "Text:",
    "---",
    sample,
    "---",
  ].join("\n");
}

function extractionPrompt(chunkText: string, schema: GraphSchema): string {
  const labels = schema.nodeLabels.map((label) => JSON.stringify(label)).join(", ");
  const types = schema.relationshipTypes.map((type) => JSON.stringify(type)).join(", ");

  return [
    "You extract entities and relationships from text into a knowledge graph.",
    `Allowed entity labels: [${labels}]`,
    `Allowed relationship types: [${types}]`,
    "",
    "Example",
    'Text: "Maria Silva, an analyst at Northwind, runs the Atlas project. She reports to Tom Reyes."',
    "JSON:",
    JSON.stringify({
      entities: [
        { label: "Person", name: "Maria Silva" },
        { label: "Company", name: "Northwind" },
        { label: "Project", name: "Atlas" },
        { label: "Person", name: "Tom Reyes" },
      ],
      relationships: [
        { source: "Maria Silva", target: "Northwind", type: "WORKS_AT" },
        { source: "Maria Silva", target: "Atlas", type: "LEADS" },
        { source: "Maria Silva", target: "Tom Reyes", type: "REPORTS_TO" },
      ],
    }),
    "",
    'Answer with one JSON object with the keys "entities" and "relationships" and nothing else.',
    `Text: ${JSON.stringify(chunkText)}`,
    "JSON:",
  ].join("\n");
}

/**
 * Turns model output into graph records. Model output is untrusted: anything
 * that does not parse and validate becomes the fallback schema or an empty
 * extraction, never an exception. Aborts still propagate.
 */
export class KnowledgeExtractor {
  private readonly logger: Logger;

  constructor(
    private readonly generator: TextGenerator,
    options: { logger?: Logger } = {},
  ) {
    this.logger = createChildLogger(options.logger ?? createSilentLogger(), "knowledge-extractor");
  }

  async inferSchema(sample: string, options: ExtractionCallOptions = {}): Promise<InferredSchema> {
    let raw: string;
    try {
      raw = await this.generator.generateText(schemaPrompt(sample), { ...options, format: "json" });
    } catch (err) {
      if (options.signal?.aborted) throw err;
      this.logger.warn({ err }, "Schema inference failed, using fallback schema");
      return { ...FALLBACK_SCHEMA, source: "fallback", reason: errorMessage(err) };
    }

    const parsed = schemaResponse.safeParse(parseJson(raw));
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues.length }, "Model returned an invalid schema");
      return { ...FALLBACK_SCHEMA, source: "fallback", reason: "Model returned an invalid schema" };
    }

    const schema: InferredSchema = {
      nodeLabels: unique(parsed.data.node_labels),
      relationshipTypes: unique(parsed.data.relationship_types),
      source: "llm",
    };
    this.logger.info(
      { nodeLabels: schema.nodeLabels, relationshipTypes: schema.relationshipTypes },
      "Inferred graph schema",
    );
    return schema;
  }

  /**
   * Entities outside the schema labels are dropped, and so are relationships
   * whose type is not allowed or whose ends were not extracted.
   */
  async extract(
    chunkText: string,
    schema: GraphSchema,
    options: ExtractionCallOptions = {},
  ): Promise<KnowledgeExtraction> {
    let raw: string;
    try {
      raw = await this.generator.generateText(extractionPrompt(chunkText, schema), {
        ...options,
        format: "json",
      });
    } catch (err) {
      if (options.signal?.aborted) throw err;
      this.logger.warn({ err }, "Knowledge extraction call failed");
      return { entities: [], relationships: [] };
    }

    const parsed = extractionResponse.safeParse(parseJson(raw));
    if (!parsed.success) {
      this.logger.warn("Model returned malformed extraction output");
      return { entities: [], relationships: [] };
    }

    const labels = new Set(schema.nodeLabels);
    const types = new Set(schema.relationshipTypes);

    const entities: ExtractedEntity[] = [];
    const seen = new Set<string>();
    for (const entity of parsed.data.entities) {
      const key = `${entity.label}\u0000${entity.name}`;
      if (labels.has(entity.label) && !seen.has(key)) {
        seen.add(key);
        entities.push(entity);
      }
    }

    const names = new Set(entities.map((entity) => entity.name));
    const relationships = parsed.data.relationships.filter(
      (rel) => types.has(rel.type) && names.has(rel.source) && names.has(rel.target),
    );

    return { entities, relationships };
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
