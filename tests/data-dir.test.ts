import { describe, it, expect } from 'vitest';
import path from 'path';
import { resolveDataDir } from '../src/boundaries/data-dir';
import { EnvironmentError } from '../src/errors/index';
import { setupTree } from './helpers';

describe('resolveDataDir', () => {
  it('defaults to Data/ under the working directory', () => {
    const root = setupTree({ 'Data/a.txt': 'a' });
    expect(resolveDataDir({ cwd: root })).toBe(path.join(root, 'Data'));
  });

  it('prefers the explicit option over the environment value', () => {
    const root = setupTree({ 'opt/a.txt': 'a', 'env/a.txt': 'a' });
    expect(resolveDataDir({ cwd: root, option: 'opt', envValue: 'env' })).toBe(path.join(root, 'opt'));
    expect(resolveDataDir({ cwd: root, envValue: 'env' })).toBe(path.join(root, 'env'));
  });

  it('throws an EnvironmentError when the directory is missing', () => {
    const root = setupTree({});
    const expected = path.join(root, 'Data');
    expect(() => resolveDataDir({ cwd: root })).toThrow(EnvironmentError);
    expect(() => resolveDataDir({ cwd: root })).toThrow(
      `Data directory not found at expected location: ${expected}`
    );
  });

  it('throws an EnvironmentError when the path is a file', () => {
    const root = setupTree({ Data: 'not a directory' });
    expect(() => resolveDataDir({ cwd: root })).toThrow(
      `Data path exists but is not a directory: ${path.join(root, 'Data')}`
    );
  });
});
