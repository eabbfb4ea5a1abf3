import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { log } from '../log';
import { LexicalIndex } from './lexicalIndex';
import { NamespaceRegistry } from './namespaceRegistry';

const SnippetFileSchema = z.array(
  z.union([z.string().min(1), z.object({ text: z.string().min(1) }).passthrough()]),
);

const NAMESPACE_FILE_RE = /^([A-Za-z0-9_.-]+)\.json$/;

export function parseSnippetFile(raw: unknown): string[] {
  const parsed = SnippetFileSchema.parse(raw);
  return parsed.map((item) => (typeof item === 'string' ? item : item.text));
}

/**
 * Loads `<dir>/<namespace>.json` files into a registry of read-only indexes.
 * A missing directory yields an empty registry; an unreadable or invalid file
 * is skipped and logged; the other namespaces still load.
 */
export async function loadKnowledgeDirectory(
  dir: string,
  registry: NamespaceRegistry<LexicalIndex> = new NamespaceRegistry(),
): Promise<NamespaceRegistry<LexicalIndex>> {
  let files: string[];
  try {
    files = await fs.readdir(dir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      log.warn({ event: 'knowledge_dir_missing', dir }, 'knowledge directory missing');
      return registry;
    }
    throw error;
  }

  for (const file of files.sort()) {
    const match = NAMESPACE_FILE_RE.exec(file);
    if (!match) continue;
    const namespace = match[1];
    const filePath = path.join(dir, file);

    try {
      const contents = await fs.readFile(filePath, 'utf8');
      const snippets = parseSnippetFile(JSON.parse(contents));
      registry.register(namespace, new LexicalIndex(snippets));
      log.info(
        { event: 'knowledge_index_loaded', namespace, snippets: snippets.length },
        'knowledge index loaded',
      );
    } catch (error) {
      log.error(
        { err: error, event: 'knowledge_index_invalid', namespace, file: filePath, alert: true },
        'knowledge index could not be loaded',
      );
    }
  }

  return registry;
}
