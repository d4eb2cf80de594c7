/**
 * Query Commands
 *
 * Free-text questions are parsed once into a tagged command; the
 * interpreter only ever sees commands.
 */

export type QueryCommand =
  | { kind: 'new_incorporations'; state?: string }
  | { kind: 'deregistrations'; state?: string }
  | { kind: 'field_updates'; field?: string }
  | { kind: 'entity'; key: string }
  | { kind: 'count'; target: 'changes' | 'entities' }
  | { kind: 'overview' };

/** Known names the parser may recognise in a question */
export interface QueryVocabulary {
  states: readonly string[];
  fields: readonly string[];
}

const ENTITY_PATTERN = /\b(?:cin|key|entity|company)\s*[:#]?\s*([A-Z0-9][A-Z0-9-]{4,})\b/gi;

function findState(query: string, vocabulary: QueryVocabulary): string | undefined {
  return vocabulary.states.find((state) => query.includes(state.toLowerCase()));
}

function findField(query: string, vocabulary: QueryVocabulary): string | undefined {
  return vocabulary.fields.find((field) => {
    const lowered = field.toLowerCase();
    return query.includes(lowered) || query.includes(lowered.replace(/_/g, ' '));
  });
}

/**
 * Parse a question into a command. Rules are tried in order; anything
 * unrecognised becomes an overview.
 */
export function parseQuery(text: string, vocabulary: QueryVocabulary): QueryCommand {
  // Identifiers always carry a digit, which keeps "company status" out
  for (const match of text.matchAll(ENTITY_PATTERN)) {
    const key = match[1];
    if (key && /\d/.test(key)) {
      return { kind: 'entity', key: key.toUpperCase() };
    }
  }

  const query = text.toLowerCase().replace(/\s+/g, ' ').trim();
  const state = findState(query, vocabulary);

  if (query.includes('incorporat') || /\bnew\b/.test(query)) {
    return state ? { kind: 'new_incorporations', state } : { kind: 'new_incorporations' };
  }

  if (/struck off|strike off|deregist|removed/.test(query)) {
    return state ? { kind: 'deregistrations', state } : { kind: 'deregistrations' };
  }

  if (/updat|chang|modif/.test(query) && !/how many|count|total/.test(query)) {
    const field = findField(query, vocabulary);
    return field ? { kind: 'field_updates', field } : { kind: 'field_updates' };
  }

  if (/how many|count|total/.test(query)) {
    return { kind: 'count', target: /compan|entit/.test(query) ? 'entities' : 'changes' };
  }

  return { kind: 'overview' };
}
