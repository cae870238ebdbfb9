/**
 * Datasource classification from a JDBC URL.
 */

import type { DatabaseAnalysis } from "./schema.js";

export function analyzeDatabase(url: string | null): DatabaseAnalysis {
  if (!url) {
    return {
      type: "none",
      mode: "none",
      url: null,
      migrationRecommended: false,
      notes: [],
    };
  }

  const lower = url.toLowerCase();

  if (lower.startsWith("jdbc:h2:mem:")) {
    return {
      type: "h2",
      mode: "in-memory",
      url,
      migrationRecommended: true,
      notes: [
        "H2 in-memory database: data is lost on every restart",
        "Cloud Run instances are ephemeral; use Cloud SQL for persistence",
      ],
    };
  }

  if (lower.startsWith("jdbc:h2:")) {
    return {
      type: "h2",
      mode: "file-based",
      url,
      migrationRecommended: true,
      notes: [
        "H2 file-based database: the container filesystem is not persistent on Cloud Run",
      ],
    };
  }

  if (lower.startsWith("jdbc:postgresql:")) {
    return {
      type: "postgresql",
      mode: "server",
      url,
      migrationRecommended: true,
      notes: ["PostgreSQL detected: can move to Cloud SQL for PostgreSQL"],
    };
  }

  if (lower.startsWith("jdbc:mysql:") || lower.startsWith("jdbc:mariadb:")) {
    return {
      type: "mysql",
      mode: "server",
      url,
      migrationRecommended: true,
      notes: ["MySQL detected: can move to Cloud SQL for MySQL"],
    };
  }

  return {
    type: "unknown",
    mode: "server",
    url,
    migrationRecommended: false,
    notes: [`Unrecognized datasource URL: ${url}`],
  };
}
