// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url").
 * Side-effects: none
 * Links: Imported by logger module; defines sensitive path patterns.
 * @internal
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "token",
  "access_token",
  "secret",
  "apiKey",
  "api_key",
  // Provider credentials
  "providerApiKey",
  "config.providerApiKey",
  "PROVIDER_API_KEY",
  // Connection strings carry credentials
  "databaseUrl",
  "DATABASE_URL",
  // HTTP headers
  "headers.authorization",
  "headers.Authorization",
  "req.headers.authorization",
  "headers.cookie",
];
