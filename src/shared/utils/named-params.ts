import type { QueryParams } from '../interfaces/db-store.interface';

export interface CompiledQuery {
  text: string;
  values: unknown[];
}

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_]/;

/**
 * Rewrites `@name` placeholders into positional `$n` references and collects
 * the bound values in matching order. A name used more than once keeps the
 * index it was first given. Single-quoted literals are copied verbatim.
 */
export function compileNamedQuery(
  sql: string,
  params: QueryParams = {},
): CompiledQuery {
  const indexes = new Map<string, number>();
  const values: unknown[] = [];
  let text = '';
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];

    if (ch === "'") {
      // '' inside a literal is an escaped quote, so scanning just resumes
      const end = sql.indexOf("'", i + 1);
      const stop = end === -1 ? sql.length : end + 1;
      text += sql.slice(i, stop);
      i = stop;
      continue;
    }

    if (ch === '@' && sql[i + 1] === '@') {
      text += '@@';
      i += 2;
      continue;
    }

    if (ch === '@' && IDENTIFIER_START.test(sql[i + 1] ?? '')) {
      let j = i + 1;
      while (j < sql.length && IDENTIFIER_PART.test(sql[j])) {
        j++;
      }
      const name = sql.slice(i + 1, j);

      let index = indexes.get(name);
      if (index === undefined) {
        if (!Object.prototype.hasOwnProperty.call(params, name)) {
          throw new Error(`Missing value for query parameter @${name}`);
        }
        values.push(params[name]);
        index = values.length;
        indexes.set(name, index);
      }

      text += `$${index}`;
      i = j;
      continue;
    }

    text += ch;
    i++;
  }

  return { text, values };
}
