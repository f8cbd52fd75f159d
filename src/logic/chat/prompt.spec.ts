import { ScoredChunk, SourceFormat } from '../../utils/types';
import {
  TUTOR_SYSTEM_PROMPT,
  UNGROUNDED_INSTRUCTION,
  buildContextBlock,
  buildTutorPrompt,
  fallbackAnswer,
  learningSuggestions,
  splitIntoFragments,
} from './prompt';

const scored = (filename: string, text: string, score: number): ScoredChunk => ({
  chunk: {
    id: `${filename}__0`,
    documentId: filename,
    ordinal: 0,
    text,
    embedding: [1, 0],
    metadata: { charStart: 0, charEnd: text.length, documentFilename: filename, sourceFormat: SourceFormat.MARKDOWN },
  },
  score,
});

describe('buildTutorPrompt', () => {
  it('tags each retrieved chunk with its source in ranking order', () => {
    const results = [scored('stacks.md', 'Stacks are LIFO.', 0.95), scored('queues.md', 'Queues are FIFO.', 0.9)];

    expect(buildContextBlock(results)).toBe(
      'Context 1 (from stacks.md):\nStacks are LIFO.\n\nContext 2 (from queues.md):\nQueues are FIFO.',
    );

    const prompt = buildTutorPrompt('What is a stack?', results, []);
    expect(prompt.system).toBe(TUTOR_SYSTEM_PROMPT);
    expect(prompt.grounded).toBe(true);
    expect(prompt.user.startsWith('Relevant course material:\nContext 1 (from stacks.md)')).toBe(true);
    expect(prompt.user).toContain("\n\nStudent's question: What is a stack?\n\n");
  });

  it('carries the ungrounded instruction when nothing was retrieved', () => {
    const history = [{ role: 'user' as const, content: 'hi', timestamp: 1 }];
    const prompt = buildTutorPrompt('What is a heap?', [], history);

    expect(prompt.grounded).toBe(false);
    expect(prompt.user.startsWith(UNGROUNDED_INSTRUCTION)).toBe(true);
    expect(prompt.history).toBe(history);
  });
});

describe('fallbackAnswer', () => {
  it('echoes the question and says no material was found', () => {
    // 16 characters selects the first template
    expect(fallbackAnswer('What is a stack?', 0)).toBe(
      'Great question about "What is a stack?"! I don\'t have specific information about this topic in your uploaded materials. ' +
        'Let me explain this concept based on what I know.' +
        '\n\nThis concept is important because it forms the foundation for more advanced topics.',
    );
  });

  it('states how many sections were found', () => {
    expect(fallbackAnswer('Explain recursion', 2)).toBe(
      'Excellent question! "Explain recursion" is an important topic. ' +
        'I found 2 relevant sections in your course materials that address this topic. ' +
        "Here's what I can tell you about it." +
        '\n\nUnderstanding this will help you with related concepts in your studies.',
    );
  });
});

describe('splitIntoFragments', () => {
  it('groups three words per fragment and joins back to the text', () => {
    const text = 'one two three four\n\nfive';
    const fragments = splitIntoFragments(text);

    expect(fragments).toEqual(['one two three ', 'four\n\nfive']);
    expect(fragments.join('')).toBe(text);
  });

  it('returns nothing for blank text', () => {
    expect(splitIntoFragments('   ')).toEqual([]);
  });
});

describe('learningSuggestions', () => {
  it('offers starters for a new session', () => {
    expect(learningSuggestions([])[0]).toBe('Upload some course materials to get personalized learning suggestions!');
  });

  it('refers to the latest question', () => {
    const suggestions = learningSuggestions([
      { role: 'user', content: 'What is a stack?', timestamp: 1 },
      { role: 'assistant', content: 'A LIFO structure.', timestamp: 2 },
    ]);
    expect(suggestions[0]).toBe('Based on your question "What is a stack?", you might want to explore related topics.');
    expect(suggestions).toHaveLength(3);
  });
});
