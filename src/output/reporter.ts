import chalk from 'chalk';
import { countWords } from '../chunking/utils';
import { error, isSilentMode, log } from './logger';

const FILE_RULE = '-'.repeat(60);
const CHUNK_RULE = '='.repeat(60);
const TRUNCATED_MARK = '... [truncated]';

export interface Preview {
  preview: string;
  truncated: boolean;
}

// Lengths and previews count code points, not UTF-16 units
export function countCharacters(text: string): number {
  return Array.from(text).length;
}

export function truncatePreview(text: string, limit: number): Preview {
  let count = 0;
  let end = 0;
  for (const ch of text) {
    if (count === limit) {
      return { preview: text.slice(0, end), truncated: true };
    }
    count += 1;
    end += ch.length;
  }
  return { preview: text, truncated: false };
}

function printPreview(text: string, limit: number) {
  const { preview, truncated } = truncatePreview(text, limit);
  log(preview);
  if (truncated) log(chalk.dim(TRUNCATED_MARK));
}

// Notices stay visible on stderr when stdout is reserved for JSON
export function printNotice(message: string) {
  if (isSilentMode()) error(message);
  else log(message);
}

export function printFileSummary(name: string, absPath: string, content: string, previewChars: number) {
  log(`${chalk.bold('File:')} ${name}`);
  log(`${chalk.bold('Path:')} ${absPath}`);
  log(`${chalk.bold('Characters:')} ${countCharacters(content)}`);
  log('\nPreview:\n');
  printPreview(content, previewChars);
  log(FILE_RULE);
}

export function printChunkSummary(chunks: string[], previewChunks: number, previewChars: number) {
  log(`${chalk.bold('Total chunks:')} ${chunks.length}`);
  chunks.slice(0, previewChunks).forEach((chunk, i) => {
    log(`\n${chalk.cyan(`Chunk ${i + 1}`)} — ${countWords(chunk)} words — Preview:\n`);
    printPreview(chunk, previewChars);
  });
  log(CHUNK_RULE);
}

export function printFileError(name: string, message: string) {
  error(chalk.red(`Failed to read ${name}: ${message}`));
}

export function printGlobalSummary(files: number, chunks: number, failures: number = 0) {
  const okMark = failures === 0 ? chalk.green('✓') : chalk.red('✖');
  const fileTxt = files === 1 ? '1 file' : `${files} files`;
  const chunkTxt = chunks === 1 ? '1 chunk' : `${chunks} chunks`;
  let line = `${okMark} ${fileTxt} processed, ${chunkTxt}`;
  if (failures > 0) {
    const failTxt = failures === 1 ? '1 failure' : `${failures} failures`;
    line += `, ${chalk.red(failTxt)}`;
  }
  log(line);
}
