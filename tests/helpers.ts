import { mkdtempSync, mkdirSync, writeFileSync } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import stripAnsi from 'strip-ansi';

export function setupTree(structure: Record<string, string | Buffer>): string {
  const root = mkdtempSync(path.join(tmpdir(), 'docslice-'));
  for (const [rel, content] of Object.entries(structure)) {
    const full = path.join(root, rel);
    mkdirSync(path.dirname(full), { recursive: true });
    writeFileSync(full, content);
  }
  return root;
}

// Console calls flattened to plain strings, one per call
export function plainCalls(calls: unknown[][]): string[] {
  return calls.map((args) => stripAnsi(args.map(String).join(' ')));
}
