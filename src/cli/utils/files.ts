/**
 * Input files for the agent commands: documents, JSON records exported
 * from other tools, and the output of earlier warden runs.
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { basename, extname, resolve } from 'node:path';
import type { z } from 'zod';
import type { AgentDocument } from '../../agents/index.js';
import { CLIError, ValidationError } from '../../errors/index.js';
import type { ProjectGraph } from '../../graph/knowledge-graph.js';
import { parseInput } from '../validation.js';

export const DEFAULT_DOC_TYPE = 'document';

/**
 * @throws CLIError when the path is missing or is a directory
 */
export function readInputFile(path: string, what: string): string {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new CLIError(`${what} does not exist: ${fullPath}`, 'Check the path and try again');
  }
  if (!statSync(fullPath).isFile()) {
    throw new CLIError(`${what} is not a file: ${fullPath}`, 'Check the path and try again');
  }
  return readFileSync(fullPath, 'utf-8');
}

/**
 * Read a JSON file and validate it. `what` names the file in errors,
 * e.g. "Events file" gives "Invalid events file".
 *
 * @throws ValidationError for malformed JSON or a schema mismatch
 */
export function readJsonFile<S extends z.ZodTypeAny>(path: string, schema: S, what: string): z.output<S> {
  const raw = readInputFile(path, what);
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`${what} is not valid JSON: ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  return parseInput(schema, data, what.toLowerCase());
}

/** The id `warden index` gives a file when no --doc-id is passed */
export function documentIdFor(projectId: string, filePath: string): string {
  return `${projectId}/${basename(filePath, extname(filePath))}`;
}

/**
 * Read document files for an agent. A file that was indexed under its
 * default id keeps the title and type it was indexed with.
 */
export function readProjectDocuments(
  paths: readonly string[],
  projectId: string,
  graph: ProjectGraph
): AgentDocument[] {
  const indexed = new Map(graph.documents.map((doc) => [doc.id, doc]));

  return paths.map((path) => {
    const id = documentIdFor(projectId, path);
    const known = indexed.get(id);
    return {
      id,
      title: known?.title ?? basename(path),
      docType: known?.docType ?? DEFAULT_DOC_TYPE,
      content: readInputFile(path, 'Document'),
    };
  });
}
