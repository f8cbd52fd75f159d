import { parseTutorConfig, validateEnv } from './config';

describe('parseTutorConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = parseTutorConfig({});

    expect(config.port).toBe(8787);
    expect(config.chunkSize).toBe(1000);
    expect(config.chunkOverlap).toBe(200);
    expect(config.maxContextChunks).toBe(5);
    expect(config.similarityThreshold).toBe(0.8);
    expect(config.maxHistoryTurns).toBe(10);
    expect(config.persistPartialAnswers).toBe(false);
    expect(config.embeddingDimension).toBeUndefined();
    expect(config.gemini.apiKey).toBeUndefined();
    expect(config.database.synchronize).toBe(true);
  });

  it('coerces numbers and flags and treats blanks as unset', () => {
    const config = parseTutorConfig({
      CHUNK_SIZE: '500',
      CHUNK_OVERLAP: '50',
      EMBEDDING_DIMENSION: '',
      GEMINI_API_KEY: '  ',
      PERSIST_PARTIAL_ANSWERS: 'true',
      CORS_ORIGINS: 'http://a.test, http://b.test,',
    });

    expect(config.chunkSize).toBe(500);
    expect(config.chunkOverlap).toBe(50);
    expect(config.embeddingDimension).toBeUndefined();
    expect(config.gemini.apiKey).toBeUndefined();
    expect(config.persistPartialAnswers).toBe(true);
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
  });
});

describe('validateEnv', () => {
  it('returns the raw environment when valid', () => {
    const raw = { GEMINI_API_KEY: 'test-secret' };
    expect(validateEnv(raw)).toBe(raw);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => validateEnv({ CHUNK_SIZE: '100', CHUNK_OVERLAP: '100' })).toThrow(
      /CHUNK_OVERLAP must be smaller than CHUNK_SIZE/,
    );
  });

  it('rejects malformed flags', () => {
    expect(() => validateEnv({ PERSIST_PARTIAL_ANSWERS: 'yes' })).toThrow(/^Invalid configuration: PERSIST_PARTIAL_ANSWERS/);
  });
});
