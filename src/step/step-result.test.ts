import { StepResult } from './step-result';

describe('StepResult', () => {
  it('starts successful with no artifacts', () => {
    const result = new StepResult('push-container-signature', 'HttpPut');
    expect(result.success).toBe(true);
    expect(result.message).toBe('');
    expect(result.getArtifacts()).toEqual([]);
  });

  it('fail sets the message and returns the same result', () => {
    const result = new StepResult('push-container-signature', 'HttpPut');
    expect(result.fail('Missing container-image-signature-name')).toBe(result);
    expect(result.success).toBe(false);
    expect(result.message).toBe('Missing container-image-signature-name');
  });

  it('keeps artifacts in insertion order and replaces by name', () => {
    const result = new StepResult('push-container-signature', 'HttpPut');
    result.addArtifact('a', '1');
    result.addArtifact('b', '2');
    result.addArtifact('a', '3');

    expect(result.getArtifacts().map((a) => `${a.name}=${a.value}`)).toEqual(['a=3', 'b=2']);
    expect(result.getArtifactValue('a')).toBe('3');
    expect(result.getArtifactValue('missing')).toBeUndefined();
  });
});
