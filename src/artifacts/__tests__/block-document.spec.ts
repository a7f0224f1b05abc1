/**
 * Block Document Tests
 */
import { parse } from 'yaml';
import {
  apiKeyInput,
  buildBlockDocument,
  displayNameOf,
  renderBlockDocument,
  summaryFromBlock,
  validateBlockDocument,
} from '../block-document';
import { priorBlockSchema } from '../artifact.types';
import { ModelRecord } from '../../catalog/catalog.types';
import { ModelSummary } from '../../classifier/classifier.types';

// ===== Test Fixtures =====

const record: ModelRecord = {
  id: 'acme/chat-model',
  type: 'chat',
  display_name: 'Acme Chat Model',
  organization: 'Acme',
  license: 'apache-2.0',
  context_length: 16000,
};

const summary: ModelSummary = {
  type: 'chat',
  roles: ['apply', 'chat'],
  contextLength: 16000,
};

describe('buildBlockDocument', () => {
  it('should build a v1 block for the model', () => {
    const doc = buildBlockDocument(record, summary, '1.2.0');

    expect(doc).toEqual({
      name: 'Acme Chat Model',
      version: '1.2.0',
      schema: 'v1',
      metadata: { type: 'chat', organization: 'Acme', license: 'apache-2.0' },
      models: [
        {
          name: 'Acme Chat Model',
          provider: 'together',
          model: 'acme/chat-model',
          apiKey: '${{ inputs.TOGETHER_API_KEY }}',
          defaultCompletionOptions: { contextLength: 16000 },
          roles: ['apply', 'chat'],
        },
      ],
    });
  });

  it('should keep roles as the last key of the model entry', () => {
    const doc = buildBlockDocument(record, summary, '1.0.0');

    expect(Object.keys(doc.models[0])).toEqual([
      'name',
      'provider',
      'model',
      'apiKey',
      'defaultCompletionOptions',
      'roles',
    ]);
  });

  it('should omit defaultCompletionOptions without a context length', () => {
    const doc = buildBlockDocument(record, { ...summary, roles: ['chat'], contextLength: 0 }, '1.0.0');

    expect(doc.models[0]).not.toHaveProperty('defaultCompletionOptions');
  });

  it('should use the identifier when there is no display name', () => {
    const doc = buildBlockDocument({ id: 'acme/raw', type: 'chat' }, summary, '1.0.0');

    expect(doc.name).toBe('acme/raw');
    expect(doc.models[0].name).toBe('acme/raw');
  });

  it('should use the configured provider', () => {
    const doc = buildBlockDocument(record, summary, '1.0.0', 'acme-cloud');

    expect(doc.models[0].provider).toBe('acme-cloud');
    expect(doc.models[0].apiKey).toBe('${{ inputs.ACME_CLOUD_API_KEY }}');
  });
});

describe('apiKeyInput', () => {
  it('should reference the provider key input', () => {
    expect(apiKeyInput('together')).toBe('${{ inputs.TOGETHER_API_KEY }}');
  });
});

describe('displayNameOf', () => {
  it('should fall back to the id for blank display names', () => {
    expect(displayNameOf({ id: 'x/y', type: 'chat', display_name: '   ' })).toBe('x/y');
  });
});

describe('validateBlockDocument', () => {
  it('should accept a built document', () => {
    expect(validateBlockDocument(buildBlockDocument(record, summary, '1.0.0'))).toBeNull();
  });

  it('should reject empty roles', () => {
    const doc = buildBlockDocument(record, { ...summary, roles: [] }, '1.0.0');

    expect(validateBlockDocument(doc)).toEqual(["Model #1: 'roles' must be a non-empty array"]);
  });

  it('should reject a provider mismatch', () => {
    const doc = buildBlockDocument(record, summary, '1.0.0', 'other');

    expect(validateBlockDocument(doc, 'together')).toEqual([
      "Model #1: Provider should be 'together', got: other",
    ]);
  });

  it('should reject an invalid version', () => {
    const doc = buildBlockDocument(record, summary, 'one');

    expect(validateBlockDocument(doc)).toEqual(['Invalid version: one']);
  });
});

describe('renderBlockDocument', () => {
  it('should start with a document marker', () => {
    const rendered = renderBlockDocument(buildBlockDocument(record, summary, '1.0.0'));

    expect(rendered.startsWith('---\nname: Acme Chat Model\nversion: 1.0.0\nschema: v1\n')).toBe(true);
  });

  it('should parse back to the same document', () => {
    const doc = buildBlockDocument(record, summary, '1.0.0');

    expect(parse(renderBlockDocument(doc))).toEqual(doc);
  });
});

describe('summaryFromBlock', () => {
  it('should recover the summary a block was built from', () => {
    const doc = buildBlockDocument(record, { ...summary, roles: ['chat', 'apply'] }, '1.0.0');
    const block = priorBlockSchema.parse(parse(renderBlockDocument(doc)));

    expect(summaryFromBlock(block)).toEqual({ type: 'chat', roles: ['apply', 'chat'], contextLength: 16000 });
  });

  it('should report a missing or unknown type as null', () => {
    const block = priorBlockSchema.parse({
      version: '1.0.0',
      metadata: { type: 'hologram' },
      models: [{ model: 'acme/legacy', roles: ['chat'] }],
    });

    expect(summaryFromBlock(block)).toEqual({ type: null, roles: ['chat'], contextLength: 0 });
  });
});
