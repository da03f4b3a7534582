/**
 * Version Gate tests: marker extraction, tip/parent comparison, fatal repository errors.
 */

import { describe, it, expect } from 'vitest';

import { GateError } from '../../src/pipeline/errors.js';
import { evaluateVersionGate, extractVersionMarker } from '../../src/pipeline/version-gate.js';
import { InMemoryRepository, cargoToml } from '../helpers/fakes.js';

const GATE = { versionFile: 'Cargo.toml', releaseBranch: 'main' };

describe('extractVersionMarker', () => {
  it('should read the quoted value on the first matching line', () => {
    expect(extractVersionMarker(cargoToml('1.4.2'))).toBe('1.4.2');
  });

  it('should use the first line mentioning the field', () => {
    const content = '[package]\nrust-version = "1.70"\nversion = "2.0.0"\n';
    expect(extractVersionMarker(content)).toBe('1.70');
  });

  it('should return empty for a missing file', () => {
    expect(extractVersionMarker(null)).toBe('');
  });

  it('should return empty when no line mentions the field', () => {
    expect(extractVersionMarker('[package]\nname = "omni"\n')).toBe('');
  });

  it('should return empty when the line has no quoted value', () => {
    expect(extractVersionMarker('version = 3\n')).toBe('');
  });

  it('should honour a custom field name', () => {
    const content = '[workspace.package]\nedition = "2021"\nrelease = "0.9.1"\n';
    expect(extractVersionMarker(content, 'release')).toBe('0.9.1');
  });
});

describe('evaluateVersionGate', () => {
  it('should not release when tip and parent markers are identical', async () => {
    const repo = new InMemoryRepository([
      { sha: 'a1', files: { 'Cargo.toml': cargoToml('1.0.0') } },
      { sha: 'b2', files: { 'Cargo.toml': cargoToml('1.0.0'), 'README.md': 'docs' } },
    ]);

    const decision = await evaluateVersionGate(repo, GATE);

    expect(decision.shouldRelease).toBe(false);
    expect(decision.version).toBe('1.0.0');
    expect(decision.reason).toBe('version unchanged (1.0.0)');
  });

  it('should release with the tip value when the marker changed', async () => {
    const repo = new InMemoryRepository([
      { sha: 'a1', files: { 'Cargo.toml': cargoToml('1.0.0') } },
      { sha: 'b2', files: { 'Cargo.toml': cargoToml('1.1.0') } },
    ]);

    const decision = await evaluateVersionGate(repo, GATE);

    expect(decision).toEqual({
      shouldRelease: true,
      version: '1.1.0',
      previousVersion: '1.0.0',
      tipRevision: 'b2',
      parentRevision: 'a1',
      reason: undefined,
    });
  });

  it('should release when the marker appears for the first time', async () => {
    const repo = new InMemoryRepository([
      { sha: 'a1', files: {} },
      { sha: 'b2', files: { 'Cargo.toml': cargoToml('0.1.0') } },
    ]);

    const decision = await evaluateVersionGate(repo, GATE);

    expect(decision.shouldRelease).toBe(true);
    expect(decision.version).toBe('0.1.0');
    expect(decision.previousVersion).toBe('');
  });

  it('should restore the original checkout afterwards', async () => {
    const repo = new InMemoryRepository([
      { sha: 'a1', files: { 'Cargo.toml': cargoToml('1.0.0') } },
      { sha: 'b2', files: { 'Cargo.toml': cargoToml('1.1.0') } },
    ]);

    await evaluateVersionGate(repo, GATE);

    expect(repo.checkouts).toEqual(['a1', 'main']);
    expect(repo.headSha()).toBe('b2');
  });

  it('should restore a detached tip by revision', async () => {
    const repo = new InMemoryRepository([
      { sha: 'a1', files: { 'Cargo.toml': cargoToml('1.0.0') } },
      { sha: 'b2', files: { 'Cargo.toml': cargoToml('1.0.0') } },
    ], null);

    await evaluateVersionGate(repo, { versionFile: 'Cargo.toml', releaseBranch: null });

    expect(repo.checkouts).toEqual(['a1', 'b2']);
  });

  it('should check a detached tip against the branch the runner reports', async () => {
    const repo = new InMemoryRepository([
      { sha: 'a1', files: { 'Cargo.toml': cargoToml('1.0.0') } },
      { sha: 'b2', files: { 'Cargo.toml': cargoToml('1.1.0') } },
    ], null);

    const decision = await evaluateVersionGate(repo, { ...GATE, detachedBranch: 'main' });

    expect(decision.shouldRelease).toBe(true);
    expect(repo.checkouts).toEqual(['a1', 'b2']);
    expect(repo.headSha()).toBe('b2');
  });

  it('should skip a detached tip the runner places on another branch', async () => {
    const repo = new InMemoryRepository([
      { sha: 'a1', files: { 'Cargo.toml': cargoToml('1.0.0') } },
      { sha: 'b2', files: { 'Cargo.toml': cargoToml('1.1.0') } },
    ], null);

    const decision = await evaluateVersionGate(repo, { ...GATE, detachedBranch: '42/merge' });

    expect(decision.shouldRelease).toBe(false);
    expect(decision.reason).toBe('branch 42/merge is not the release branch main');
    expect(repo.checkouts).toEqual([]);
  });

  it('should fail with GateError when the tip has no parent', async () => {
    const repo = new InMemoryRepository([
      { sha: 'a1', files: { 'Cargo.toml': cargoToml('1.0.0') } },
    ]);

    await expect(evaluateVersionGate(repo, GATE)).rejects.toThrow(GateError);
    await expect(evaluateVersionGate(repo, GATE)).rejects.toThrow('Tip a1 has no parent revision');
  });

  it('should skip history on a branch other than the release branch', async () => {
    const repo = new InMemoryRepository([
      { sha: 'a1', files: { 'Cargo.toml': cargoToml('1.0.0') } },
      { sha: 'b2', files: { 'Cargo.toml': cargoToml('1.1.0') } },
    ], 'feature/x');

    const decision = await evaluateVersionGate(repo, GATE);

    expect(decision.shouldRelease).toBe(false);
    expect(decision.reason).toBe('branch feature/x is not the release branch main');
    expect(repo.checkouts).toEqual([]);
  });

  it('should ignore the branch when no release branch is configured', async () => {
    const repo = new InMemoryRepository([
      { sha: 'a1', files: { 'Cargo.toml': cargoToml('1.0.0') } },
      { sha: 'b2', files: { 'Cargo.toml': cargoToml('1.1.0') } },
    ], 'feature/x');

    const decision = await evaluateVersionGate(repo, { versionFile: 'Cargo.toml', releaseBranch: null });

    expect(decision.shouldRelease).toBe(true);
  });
});
