import { describe, expect, it } from 'vitest';
import { AngleGenerator, buildAnglePrompt, parseAngles } from '@/services/angle-generator';
import { GenerationError } from '@/services/errors';
import { taskLlm } from './helpers';

describe('parseAngles', () => {
  it('trims lines, drops blanks and keeps provider order', () => {
    expect(parseAngles('\n  First angle?  \n\nSecond angle?\r\n   \nThird angle?\n')).toEqual([
      'First angle?',
      'Second angle?',
      'Third angle?',
    ]);
  });

  it('does not cap the number of angles', () => {
    const raw = Array.from({ length: 7 }, (_, i) => `Angle ${i + 1}`).join('\n');
    expect(parseAngles(raw)).toHaveLength(7);
  });
});

describe('AngleGenerator', () => {
  it('asks the angles task with the quoted query and returns parsed lines', async () => {
    const { llm, complete } = taskLlm({ angles: 'What are the principles?\nWhat are the applications?' });

    const angles = await new AngleGenerator(llm).generate('  What is quantum computing?  ');

    expect(angles).toEqual(['What are the principles?', 'What are the applications?']);
    expect(complete).toHaveBeenCalledWith(buildAnglePrompt('What is quantum computing?'), { task: 'angles' });
    expect(buildAnglePrompt('What is quantum computing?')).toContain('query: "What is quantum computing?"');
  });

  it('fails with GenerationError when the reply has no usable lines', async () => {
    const { llm } = taskLlm({ angles: '\n   \n' });

    await expect(new AngleGenerator(llm).generate('q')).rejects.toBeInstanceOf(GenerationError);
  });

  it('wraps capability failures in GenerationError', async () => {
    const { llm } = taskLlm({ angles: new Error('deployment not found') });

    await expect(new AngleGenerator(llm).generate('q')).rejects.toThrow(
      'Failed to generate analysis angles: deployment not found',
    );
  });

  it('rejects a blank query without calling the capability', async () => {
    const { llm, complete } = taskLlm({ angles: 'x' });

    await expect(new AngleGenerator(llm).generate('   ')).rejects.toThrow('Query must be a non-empty string');
    expect(complete).not.toHaveBeenCalled();
  });
});
