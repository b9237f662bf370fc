/**
 * Classifier Tests
 *
 * Format detection, rule-based intent scoring and the LLM strategy's
 * downgrade to General when the model times out, fails or answers badly.
 */

import {
  createClassifier,
  createInputDocument,
  detectFormat,
  DocumentTextReader,
  LlmClassifier,
  RuleBasedClassifier,
} from '@docintake/shared';
import {
  PDF_BYTES,
  failingIntentModel,
  fixedIntentModel,
  hangingIntentModel,
  loadFixture,
  pdfText,
} from './helpers';

describe('Format Detection', () => {
  it('should detect a JSON object', () => {
    expect(detectFormat(createInputDocument('{"amount": 10}'))).toBe('JSON');
  });

  it('should detect a JSON array', () => {
    expect(detectFormat(createInputDocument('[1, 2, 3]'))).toBe('JSON');
  });

  it('should detect email headers after leading blank lines', () => {
    const input = createInputDocument('\n\nFrom: ops@fabrikam.example\nSubject: Hello\n\nBody');
    expect(detectFormat(input)).toBe('Email');
  });

  it('should detect PDF magic bytes', () => {
    expect(detectFormat(createInputDocument(PDF_BYTES))).toBe('PDF');
  });

  it('should treat plain prose as Text', () => {
    expect(detectFormat(createInputDocument('Hello there, see you at lunch.'))).toBe('Text');
  });

  it('should treat empty and whitespace-only input as Unknown', () => {
    expect(detectFormat(createInputDocument(''))).toBe('Unknown');
    expect(detectFormat(createInputDocument('  \n\t '))).toBe('Unknown');
  });

  it('should keep malformed JSON as JSON', () => {
    expect(detectFormat(createInputDocument('{"vendor": "Acme",'))).toBe('JSON');
  });

  it('should not treat a JSON scalar as JSON', () => {
    expect(detectFormat(createInputDocument('42'))).toBe('Text');
  });

  it('should prefer parsed JSON over header-like text inside it', () => {
    expect(detectFormat(createInputDocument('{"note": "From: someone"}'))).toBe('JSON');
  });

  it('should fall back to the filename extension', () => {
    expect(detectFormat(createInputDocument('just words', { filename: 'message.EML' }))).toBe('Email');
    expect(detectFormat(createInputDocument('just words', { filename: 'notes.txt' }))).toBe('Text');
  });

  it('should ignore a UTF-8 byte order mark', () => {
    expect(detectFormat(createInputDocument('\uFEFF{"amount": 10}'))).toBe('JSON');
  });
});

describe('Rule-Based Classifier', () => {
  const classifier = new RuleBasedClassifier(new DocumentTextReader());

  it('should classify an invoice payload by its shape', async () => {
    const result = await classifier.classify(createInputDocument(loadFixture('invoice.json')));

    expect(result).toEqual({
      format: 'JSON',
      intent: 'Invoice',
      confidence: 0.9,
      method: 'rules',
      reasoning: 'Payload covers 100% of Invoice required fields',
    });
  });

  it('should map key variants when judging shape', async () => {
    const result = await classifier.classify(createInputDocument(loadFixture('rfq.json')));

    expect(result.intent).toBe('RFQ');
    expect(result.confidence).toBe(0.9);
  });

  it('should honour a declared document type', async () => {
    const result = await classifier.classify(createInputDocument(loadFixture('complaint.json')));

    expect(result).toMatchObject({
      format: 'JSON',
      intent: 'Complaint',
      confidence: 0.95,
      reasoning: 'Payload declares its type as Complaint',
    });
  });

  it('should classify the urgent quote email as RFQ', async () => {
    const result = await classifier.classify(createInputDocument(loadFixture('rfq-urgent.eml')));

    expect(result).toEqual({
      format: 'Email',
      intent: 'RFQ',
      confidence: 0.5,
      method: 'rules',
      reasoning: '1 of 1 intent cues point to RFQ',
    });
  });

  it('should classify a complaint email with several cues at full confidence', async () => {
    const result = await classifier.classify(createInputDocument(loadFixture('complaint.eml')));

    expect(result).toMatchObject({ format: 'Email', intent: 'Complaint', confidence: 1 });
  });

  it('should classify a regulatory notice', async () => {
    const result = await classifier.classify(createInputDocument(loadFixture('regulation-notice.txt')));

    expect(result).toMatchObject({ format: 'Text', intent: 'Regulation', confidence: 1 });
  });

  it('should return General when no cue matches', async () => {
    const result = await classifier.classify(
      createInputDocument('Hello, just checking in about lunch tomorrow.')
    );

    expect(result).toEqual({
      format: 'Text',
      intent: 'General',
      confidence: 0.5,
      method: 'rules',
      reasoning: 'No intent cues found',
    });
  });

  it('should break ties in favour of the earlier intent', async () => {
    const result = await classifier.classify(
      createInputDocument('Please send a quote. Our last invoice was paid.')
    );

    expect(result.intent).toBe('Invoice');
    expect(result.confidence).toBe(0.25);
  });

  it('should return Unknown for empty input', async () => {
    const result = await classifier.classify(createInputDocument(''));

    expect(result).toEqual({
      format: 'Unknown',
      intent: 'Unknown',
      confidence: 0,
      method: 'rules',
      reasoning: 'No readable content',
    });
  });

  it('should classify PDF text', async () => {
    const reader = new DocumentTextReader(async () => pdfText('Invoice 7781\nAmount due: $420.00'));
    const result = await new RuleBasedClassifier(reader).classify(createInputDocument(PDF_BYTES));

    expect(result).toMatchObject({ format: 'PDF', intent: 'Invoice' });
  });

  it('should return a frozen result', async () => {
    const result = await classifier.classify(createInputDocument('Invoice attached'));
    expect(Object.isFrozen(result)).toBe(true);
  });
});

describe('LLM Classifier', () => {
  const options = { timeoutMs: 1000, previewChars: 2000 };

  it('should use the model answer', async () => {
    const model = fixedIntentModel({ intent: 'Invoice', confidence: 0.87, reasoning: 'Mentions an amount due' });
    const classifier = new LlmClassifier(new DocumentTextReader(), model, options);

    const result = await classifier.classify(createInputDocument('Amount due: $500'));

    expect(result).toEqual({
      format: 'Text',
      intent: 'Invoice',
      confidence: 0.87,
      method: 'llm',
      reasoning: 'Mentions an amount due',
      model: 'test-model',
    });
  });

  it('should send only the preview to the model', async () => {
    const model = fixedIntentModel({ intent: 'General', confidence: 0.6 });
    const classifier = new LlmClassifier(new DocumentTextReader(), model, { timeoutMs: 1000, previewChars: 5 });

    await classifier.classify(createInputDocument('abcdefghijklmnop'));

    expect(model.previews).toEqual(['abcde']);
  });

  it('should return General with zero confidence on timeout', async () => {
    const model = hangingIntentModel();
    const classifier = new LlmClassifier(new DocumentTextReader(), model, { timeoutMs: 20, previewChars: 2000 });

    const result = await classifier.classify(createInputDocument('Please find the quarterly report attached.'));

    expect(result).toEqual({
      format: 'Text',
      intent: 'General',
      confidence: 0,
      method: 'fallback',
      reasoning: 'Intent classification failed: Intent classification timed out after 20ms',
    });
    expect(model.signals).toHaveLength(1);
    expect(model.signals[0].aborted).toBe(true);
  });

  it('should return General when the model call fails', async () => {
    const classifier = new LlmClassifier(
      new DocumentTextReader(),
      failingIntentModel(new Error('503 Service Unavailable')),
      options
    );

    const result = await classifier.classify(createInputDocument('Invoice attached'));

    expect(result).toMatchObject({
      intent: 'General',
      confidence: 0,
      method: 'fallback',
      reasoning: 'Intent classification failed: 503 Service Unavailable',
    });
  });

  it('should reject an intent outside the enumeration', async () => {
    const model = fixedIntentModel({ intent: 'Purchase', confidence: 0.9 });
    const classifier = new LlmClassifier(new DocumentTextReader(), model, options);

    const result = await classifier.classify(createInputDocument('Purchase order 12'));

    expect(result.intent).toBe('General');
    expect(result.method).toBe('fallback');
    expect(result.reasoning).toBe('Intent classification failed: Intent model returned unknown intent: Purchase');
  });

  it('should reject a confidence outside [0, 1]', async () => {
    const model = fixedIntentModel({ intent: 'RFQ', confidence: 1.7 });
    const classifier = new LlmClassifier(new DocumentTextReader(), model, options);

    const result = await classifier.classify(createInputDocument('Quote please'));

    expect(result).toMatchObject({ intent: 'General', confidence: 0, method: 'fallback' });
  });

  it('should keep the detected format when the model fails', async () => {
    const classifier = new LlmClassifier(
      new DocumentTextReader(),
      failingIntentModel(new Error('socket hang up')),
      options
    );

    const result = await classifier.classify(createInputDocument(loadFixture('rfq-urgent.eml')));

    expect(result.format).toBe('Email');
    expect(result.intent).toBe('General');
  });

  it('should not call the model for unreadable input', async () => {
    const model = fixedIntentModel({ intent: 'Invoice', confidence: 0.9 });
    const classifier = new LlmClassifier(new DocumentTextReader(), model, options);

    const result = await classifier.classify(createInputDocument('   '));

    expect(result).toMatchObject({ format: 'Unknown', intent: 'Unknown', confidence: 0, method: 'llm' });
    expect(model.previews).toEqual([]);
  });
});

describe('createClassifier', () => {
  const reader = new DocumentTextReader();

  it('should build the rule-based classifier', () => {
    expect(createClassifier({ reader, strategy: 'rules' })).toBeInstanceOf(RuleBasedClassifier);
  });

  it('should build the LLM classifier around a given model', () => {
    const classifier = createClassifier({
      reader,
      strategy: 'llm',
      intentModel: fixedIntentModel({ intent: 'General', confidence: 0.5 }),
    });
    expect(classifier).toBeInstanceOf(LlmClassifier);
    expect(classifier.strategy).toBe('llm');
  });
});
