/**
 * sanitizeFilename Tests
 */
import { sanitizeFilename } from '../sanitize';

describe('sanitizeFilename', () => {
  it.each([
    ['meta-llama/Llama-3 (8B)', 'meta-llama_llama-3-8b'],
    ['Gemma Instruct (2B)', 'gemma-instruct-2b'],
    ['Mistral (7B) Instruct v0.2', 'mistral-7b-instruct-v0.2'],
    ['org/model [beta] {x}', 'org_model-beta-x'],
    ['a  b', 'a-b'],
    ['weird:name?*', 'weird_name'],
    ['trailing - ', 'trailing'],
    ['Already_safe-name.v1', 'already_safe-name.v1'],
    ['Café/Modèle', 'café_modèle'],
    ['Qwen/通义千问 2', 'qwen_通义千问-2'],
  ])('should turn %j into %j', (input, expected) => {
    expect(sanitizeFilename(input)).toBe(expected);
  });

  it('should be deterministic', () => {
    expect(sanitizeFilename('Org/Model')).toBe(sanitizeFilename('Org/Model'));
  });
});
