import pluralize from "pluralize";

/**
 * Initialisms that keep their all-caps form inside identifiers,
 * e.g. "user_id" -> "UserID", "api-url" -> "APIURL"
 */
export const commonInitialisms: ReadonlySet<string> = new Set([
  "API",
  "ASCII",
  "CPU",
  "CSS",
  "DNS",
  "EOF",
  "GUID",
  "HTML",
  "HTTP",
  "HTTPS",
  "ID",
  "IP",
  "JSON",
  "LHS",
  "QPS",
  "RAM",
  "RHS",
  "RPC",
  "SLA",
  "SMTP",
  "SQL",
  "SSH",
  "TCP",
  "TLS",
  "TTL",
  "UDP",
  "UI",
  "UID",
  "UUID",
  "URI",
  "URL",
  "UTF8",
  "VM",
  "XML",
  "XSRF",
  "XSS",
]);

const WORD_CHAR = /[\p{L}\p{N}_]/u;

/**
 * Upper-case every letter that starts a word.
 * A word starts after any character that is not a letter, digit or underscore.
 */
function toTitle(str: string): string {
  let result = "";
  let previous = "";
  for (const char of str) {
    result += previous === "" || !WORD_CHAR.test(previous) ? char.toUpperCase() : char;
    previous = char;
  }
  return result;
}

/**
 * Split a string into words on dashes, underscores and camelCase boundaries
 * e.g. "user-profile_imageURL" -> ["user", "profile", "image", "URL"]
 */
export function splitWords(str: string): string[] {
  return str
    .replace(/[-_]/g, " ")
    .replace(/([\p{Ll}\p{N}])(\p{Lu})/gu, "$1 $2")
    .split(" ");
}

function toIdentifierPart(part: string): string {
  const upper = part.toUpperCase();
  if (commonInitialisms.has(upper)) {
    return upper;
  }
  return toTitle(part.toLowerCase());
}

/**
 * Generate a Go identifier from an arbitrary schema string
 *
 * Exported identifiers start upper-case, unexported ones lower-case.
 * Characters that can't appear in an identifier are dropped, so the
 * result may be empty; callers must treat that as an error.
 *
 * @example
 * generateIdentifier("user_id", true) // "UserID"
 * generateIdentifier("user-profile", false) // "userProfile"
 */
export function generateIdentifier(source: string, exported: boolean): string {
  const parts = splitWords(source).map(toIdentifierPart);
  if (!exported && parts.length > 0) {
    parts[0] = (parts[0] ?? "").toLowerCase();
  }

  let identifier = "";
  for (const char of parts.join("")) {
    if (/\p{L}/u.test(char) || char === "_" || (/\p{Nd}/u.test(char) && identifier !== "")) {
      identifier += char;
    }
  }

  // Dropped leading characters can leave the case of the first letter wrong
  const [head, ...tail] = identifier;
  if (head === undefined) {
    return "";
  }
  return (exported ? head.toUpperCase() : head.toLowerCase()) + tail.join("");
}

/**
 * Singularize a (usually plural) name for the element type of a collection
 * e.g. "Items" -> "Item"; names that don't change get an "Item" suffix
 */
export function singularize(plural: string): string {
  const singular = pluralize.singular(plural);
  return singular === plural ? `${plural}Item` : singular;
}

/**
 * Check if a name is a valid Go identifier
 */
export function isValidIdentifier(name: string): boolean {
  return /^[\p{L}_][\p{L}\p{Nd}_]*$/u.test(name);
}
