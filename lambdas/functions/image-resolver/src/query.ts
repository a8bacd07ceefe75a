import { InvalidQueryError } from './errors';

export const OWNER_ALIASES = ['self', 'amazon', 'aws-marketplace'] as const;

export type OwnerAlias = (typeof OWNER_ALIASES)[number];

/**
 * `self`, `amazon`, `aws-marketplace` or a 12-digit AWS account id.
 */
export type OwnerScope = OwnerAlias | string;

export interface ImageQuery {
  readonly ownerScope: OwnerScope;
  /** Regular expression, anchored at the first character of the image name. */
  readonly namePattern: string;
}

export interface CompiledQuery {
  readonly query: ImageQuery;
  readonly matcher: RegExp;
  /** Literal text every matching name starts with, empty when none can be derived. */
  readonly namePrefix: string;
}

const ACCOUNT_ID = /^\d{12}$/;
const REGEX_SPECIAL = new Set(['\\', '^', '$', '.', '|', '?', '*', '+', '(', ')', '[', ']', '{', '}']);
const OPTIONAL_QUANTIFIERS = new Set(['?', '*', '{']);

export function isAccountId(value: string): boolean {
  return ACCOUNT_ID.test(value);
}

function isOwnerAlias(value: string): value is OwnerAlias {
  return OWNER_ALIASES.some((alias) => alias === value);
}

export function compileQuery(query: ImageQuery): CompiledQuery {
  if (!isOwnerAlias(query.ownerScope) && !isAccountId(query.ownerScope)) {
    throw new InvalidQueryError(
      `Owner scope ${JSON.stringify(query.ownerScope)} is not one of ${OWNER_ALIASES.join(', ')} or a 12-digit account id`,
    );
  }
  if (query.namePattern.length === 0) {
    throw new InvalidQueryError('Name pattern must not be empty');
  }

  // Validate the pattern on its own first, wrapping it in a group could balance stray parentheses.
  try {
    new RegExp(query.namePattern);
  } catch (error) {
    throw new InvalidQueryError(`Name pattern ${JSON.stringify(query.namePattern)} is not a valid regular expression`, {
      cause: error,
    });
  }

  return {
    query,
    matcher: new RegExp(`^(?:${query.namePattern})`),
    namePrefix: literalPrefix(query.namePattern),
  };
}

/**
 * Derive the literal text at the start of a pattern so the catalog can narrow
 * its listing server-side. Returns an empty string when the pattern can start
 * with more than one string literal.
 */
export function literalPrefix(pattern: string): string {
  if (pattern.includes('|')) {
    return '';
  }

  const body = pattern.startsWith('^') ? pattern.slice(1) : pattern;
  let prefix = '';
  for (const char of body) {
    if (REGEX_SPECIAL.has(char)) {
      if (OPTIONAL_QUANTIFIERS.has(char)) {
        prefix = prefix.slice(0, -1);
      }
      break;
    }
    prefix += char;
  }
  return prefix;
}
