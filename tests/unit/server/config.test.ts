/**
 * Unit Tests for environment configuration
 *
 * @module tests/unit/server/config
 */

import { describe, it, expect } from 'vitest';
import { defaultServerConfig, loadServerConfig } from '../../../src/server/config.js';
import { MCPError } from '../../../src/server/errors.js';

function configError(env: Record<string, string>): MCPError {
  try {
    loadServerConfig(env);
  } catch (error) {
    if (error instanceof MCPError) return error;
    throw error;
  }
  throw new Error('expected a configuration error');
}

describe('loadServerConfig', () => {
  it('applies every default to an empty environment', () => {
    const config = loadServerConfig({});

    expect(config.constraints).toEqual({ maxDepth: 2, maxNodes: 30, minPubmedCitations: 2 });
    expect(config.useConcepts).toBe(true);
    expect(config.fetchConcurrency).toBe(3);
    expect(config.maxResultsPerNode).toBe(20);
    expect(config.maxFetchAttempts).toBe(2);
    expect(config.minConceptRelevance).toBe(0.8);
    expect(config.relationshipTypes).toEqual([]);
    expect(config.validateNewNodes).toBe(false);
    expect(config.lexiconPath).toBeUndefined();
    expect(config.umls.version).toBe('current');
    expect(config.umls.apiKey).toBeUndefined();
  });

  it('matches defaultServerConfig', () => {
    expect(loadServerConfig({})).toEqual(defaultServerConfig());
  });

  it('reads numbers, booleans, lists and keys', () => {
    const config = loadServerConfig({
      MEDKG_MAX_DEPTH: '3',
      MEDKG_MAX_NODES: ' 50 ',
      MEDKG_USE_CONCEPTS: 'off',
      MEDKG_VALIDATE_NEW_NODES: 'Yes',
      MEDKG_RELATIONSHIP_TYPES: 'biomarker_for, causes,',
      UMLS_API_KEY: 'test-secret',
      PUBMED_EMAIL: 'dev@example.org',
    });

    expect(config.constraints).toEqual({ maxDepth: 3, maxNodes: 50, minPubmedCitations: 2 });
    expect(config.useConcepts).toBe(false);
    expect(config.validateNewNodes).toBe(true);
    expect(config.relationshipTypes).toEqual(['BIOMARKER_FOR', 'CAUSES']);
    expect(config.umls.apiKey).toBe('test-secret');
    expect(config.pubmed.email).toBe('dev@example.org');
  });

  it('reads the cohort table paths', () => {
    const config = loadServerConfig({
      MEDKG_PATIENT_DATA_PATH: '/tmp/cohort.json',
      MEDKG_COLUMN_META_PATH: ' /tmp/meta.json ',
    });
    expect(config.patientDataPath).toBe('/tmp/cohort.json');
    expect(config.columnMetaPath).toBe('/tmp/meta.json');
  });

  it('treats blank values as unset', () => {
    const config = loadServerConfig({ MEDKG_MAX_DEPTH: '  ', UMLS_API_KEY: '' });
    expect(config.constraints.maxDepth).toBe(2);
    expect(config.umls.apiKey).toBeUndefined();
  });

  it('rejects a non-numeric number', () => {
    const error = configError({ MEDKG_MAX_DEPTH: 'deep' });
    expect(error.category).toBe('CONFIGURATION_ERROR');
    expect(error.message).toBe('MEDKG_MAX_DEPTH must be a number, got "deep"');
  });

  it('rejects an unrecognized boolean', () => {
    const error = configError({ MEDKG_USE_CONCEPTS: 'maybe' });
    expect(error.message).toBe('MEDKG_USE_CONCEPTS must be a boolean, got "maybe"');
  });

  it('rejects out-of-range constraints with the offending path', () => {
    const error = configError({ MEDKG_MAX_NODES: '2' });
    expect(error.category).toBe('CONFIGURATION_ERROR');
    expect(error.message).toBe('Invalid server configuration');
    expect(error.details?.issues).toEqual([expect.stringMatching(/^constraints\.maxNodes: /)]);
  });

  it('rejects unknown relationship types', () => {
    const error = configError({ MEDKG_RELATIONSHIP_TYPES: 'CAUSES,CURES' });
    expect(error.details?.issues).toEqual([expect.stringMatching(/^relationshipTypes\.1: /)]);
  });
});
