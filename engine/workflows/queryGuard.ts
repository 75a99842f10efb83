import { ValidationError, type ValidationIssue } from "../ai/errors";

export const SCOPE_PARAMETER = ":assessment_id";

const READ_ONLY_LEADERS = ["SELECT", "WITH"];

const MUTATION_KEYWORDS = [
  "INSERT",
  "UPDATE",
  "DELETE",
  "DROP",
  "ALTER",
  "TRUNCATE",
  "CREATE",
  "REPLACE",
  "UPSERT",
  "MERGE",
  "ATTACH",
  "DETACH",
  "PRAGMA",
  "VACUUM",
  "REINDEX",
  "ANALYZE",
  "GRANT",
  "REVOKE",
];

const mutationPattern = new RegExp(`\\b(${MUTATION_KEYWORDS.join("|")})\\b`, "gi");

/** Pulls the statement out of a model reply, dropping markdown fences. */
export function extractQuery(reply: string): string {
  const fenced = reply.match(/```(?:sql)?\s*([\s\S]*?)```/i);
  return (fenced?.[1] ?? reply).trim();
}

/**
 * Textual read-only gate. Returns the statement without its trailing
 * semicolon, or throws ValidationError listing every rule it breaks.
 */
export function assertReadOnlyQuery(query: string): string {
  const statement = query.trim().replace(/;\s*$/, "").trim();
  const issues: ValidationIssue[] = [];

  if (statement.length === 0) {
    issues.push({ path: "query", message: "query is empty" });
  } else {
    const leader = statement.split(/\s+/, 1)[0]?.toUpperCase() ?? "";
    if (!READ_ONLY_LEADERS.includes(leader)) {
      issues.push({ path: "query", message: `query must begin with SELECT or WITH, found ${leader}` });
    }
  }

  if (statement.includes(";")) {
    issues.push({ path: "query", message: "only a single statement is allowed" });
  }
  if (/--|\/\*/.test(statement)) {
    issues.push({ path: "query", message: "comments are not allowed" });
  }

  const mutations = [...new Set([...statement.matchAll(mutationPattern)].map((match) => (match[1] ?? "").toUpperCase()))];
  if (mutations.length > 0) {
    issues.push({ path: "query", message: `mutation keyword(s) not allowed: ${mutations.join(", ")}` });
  }

  if (!statement.includes(SCOPE_PARAMETER)) {
    issues.push({ path: "query", message: `query must filter on ${SCOPE_PARAMETER}` });
  }

  if (issues.length > 0) {
    throw new ValidationError(`Rejected query: ${issues.map((issue) => issue.message).join("; ")}`, {
      subject: "query",
      issues,
    });
  }

  return statement;
}
