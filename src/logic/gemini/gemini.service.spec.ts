import { Test, TestingModule } from '@nestjs/testing';
import { TUTOR_CONFIG, parseTutorConfig } from '../../utils/config';
import { EmbeddingUnavailableError, GenerationUnavailableError } from '../../utils/errors';
import { TutorPrompt } from '../../utils/types';
import { GeminiService, toContents } from './gemini.service';

const mockEmbedContent = jest.fn();
const mockGenerateContentStream = jest.fn();

jest.mock('@google/genai', () => ({
  GoogleGenAI: jest.fn().mockImplementation(() => ({
    models: {
      embedContent: mockEmbedContent,
      generateContentStream: mockGenerateContentStream,
    },
  })),
}));

const prompt: TutorPrompt = {
  system: 'You are a tutor.',
  user: 'What is a stack?',
  history: [
    { role: 'user', content: 'hi', timestamp: 1 },
    { role: 'assistant', content: 'hello', timestamp: 2 },
  ],
  grounded: true,
};

async function createService(env: Record<string, string>): Promise<GeminiService> {
  const module: TestingModule = await Test.createTestingModule({
    providers: [GeminiService, { provide: TUTOR_CONFIG, useValue: parseTutorConfig(env) }],
  }).compile();
  return module.get<GeminiService>(GeminiService);
}

async function* responses(...texts: Array<string | undefined>) {
  for (const text of texts) yield { text };
}

describe('GeminiService', () => {
  let service: GeminiService;

  beforeEach(async () => {
    mockEmbedContent.mockReset();
    mockGenerateContentStream.mockReset();
    service = await createService({ GEMINI_API_KEY: 'test-secret', EMBEDDING_BATCH_SIZE: '2' });
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
    expect(service.isAvailable).toBe(true);
  });

  it('embeds texts in batches and keeps input order', async () => {
    mockEmbedContent.mockImplementation(async ({ contents }: { contents: string[] }) => ({
      embeddings: contents.map((_, i) => ({ values: [i + 1, 0] })),
    }));

    const vectors = await service.embedTexts(['a', 'b', 'c']);

    expect(mockEmbedContent).toHaveBeenCalledTimes(2);
    expect(mockEmbedContent.mock.calls[0][0].contents).toEqual(['a', 'b']);
    expect(mockEmbedContent.mock.calls[1][0].contents).toEqual(['c']);
    expect(vectors).toEqual([[1, 0], [2, 0], [1, 0]]);
  });

  it('fails when the provider returns fewer vectors than inputs', async () => {
    mockEmbedContent.mockResolvedValue({ embeddings: [{ values: [1] }] });

    await expect(service.embedTexts(['a', 'b'])).rejects.toBeInstanceOf(EmbeddingUnavailableError);
  });

  it('wraps SDK failures as EmbeddingUnavailable', async () => {
    mockEmbedContent.mockRejectedValue(new Error('quota exceeded'));

    await expect(service.embedTexts(['a'])).rejects.toMatchObject({
      code: 'EmbeddingUnavailable',
      message: 'Embedding failed: quota exceeded',
    });
  });

  it('streams non-empty text fragments', async () => {
    mockGenerateContentStream.mockResolvedValue(responses('Hel', undefined, 'lo'));

    const fragments: string[] = [];
    for await (const fragment of service.streamAnswer(prompt, new AbortController().signal)) {
      fragments.push(fragment);
    }

    expect(fragments).toEqual(['Hel', 'lo']);
    expect(mockGenerateContentStream.mock.calls[0][0].contents).toEqual(toContents(prompt));
  });

  it('wraps streaming failures as GenerationUnavailable', async () => {
    mockGenerateContentStream.mockRejectedValue(new Error('model overloaded'));

    const iterate = async () => {
      for await (const fragment of service.streamAnswer(prompt, new AbortController().signal)) {
        expect(fragment).toBeDefined();
      }
    };
    await expect(iterate()).rejects.toBeInstanceOf(GenerationUnavailableError);
  });

  it('is unavailable without an API key', async () => {
    const offline = await createService({});

    expect(offline.isAvailable).toBe(false);
    await expect(offline.embedTexts(['a'])).rejects.toBeInstanceOf(EmbeddingUnavailableError);
  });
});

describe('toContents', () => {
  it('puts the system prompt in a leading user turn and maps assistant to model', () => {
    expect(toContents(prompt)).toEqual([
      { role: 'user', parts: [{ text: 'You are a tutor.' }] },
      { role: 'user', parts: [{ text: 'hi' }] },
      { role: 'model', parts: [{ text: 'hello' }] },
      { role: 'user', parts: [{ text: 'What is a stack?' }] },
    ]);
  });
});
