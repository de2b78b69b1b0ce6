// src/core/export/json.ts
import type { ScrapeResult } from '../types/index.js';

export function formatJsonOutput(result: ScrapeResult, compact: boolean = false): string {
  return compact ? JSON.stringify(result) : JSON.stringify(result, null, 2);
}
