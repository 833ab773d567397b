/**
 * Idempotent DDL for the knowledge tables. Mirrors `./schema` and is applied
 * by the vector store on first use; the similarity index itself depends on
 * the deployment's dimension and metric and is created separately.
 */
export function getSchemaSql(): string {
  return `
    CREATE EXTENSION IF NOT EXISTS vector;

    CREATE TABLE IF NOT EXISTS documents (
      id text PRIMARY KEY,
      filename text NOT NULL,
      filetype text NOT NULL DEFAULT 'unknown',
      ingested_at timestamptz NOT NULL DEFAULT now()
    );

    CREATE TABLE IF NOT EXISTS chunks (
      id text PRIMARY KEY,
      document_id text NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
      text text NOT NULL,
      embedding vector NOT NULL,
      ordinal integer NOT NULL,
      source_filename text NOT NULL,
      created_at timestamptz NOT NULL DEFAULT now()
    );
    CREATE INDEX IF NOT EXISTS chunks_document_ordinal_idx ON chunks (document_id, ordinal);

    CREATE TABLE IF NOT EXISTS chunk_links (
      from_chunk_id text NOT NULL REFERENCES chunks(id) ON DELETE CASCADE,
      to_chunk_id text NOT NULL REFERENCES chunks(id) ON DELETE CASCADE,
      type text NOT NULL DEFAULT 'NEXT',
      PRIMARY KEY (from_chunk_id, to_chunk_id)
    );

    CREATE TABLE IF NOT EXISTS entities (
      id text PRIMARY KEY,
      label text NOT NULL,
      name text NOT NULL,
      created_at timestamptz NOT NULL DEFAULT now(),
      CONSTRAINT entities_label_name_unique UNIQUE (label, name)
    );

    CREATE TABLE IF NOT EXISTS chunk_mentions (
      chunk_id text NOT NULL REFERENCES chunks(id) ON DELETE CASCADE,
      entity_id text NOT NULL REFERENCES entities(id) ON DELETE CASCADE,
      PRIMARY KEY (chunk_id, entity_id)
    );

    CREATE TABLE IF NOT EXISTS entity_relations (
      source_entity_id text NOT NULL REFERENCES entities(id) ON DELETE CASCADE,
      target_entity_id text NOT NULL REFERENCES entities(id) ON DELETE CASCADE,
      type text NOT NULL,
      PRIMARY KEY (source_entity_id, target_entity_id, type)
    );
  `;
}
