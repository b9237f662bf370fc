/**
 * Orchestrator
 *
 * The single entry point of the pipeline: classify, route, extract, append, and
 * return the stored record. Classification and extraction problems are absorbed
 * into the record; a store failure rejects with PipelineError.
 */

import { ulid } from 'ulid';
import { createAgents } from './agents';
import { AgentRegistry } from './agents/registry';
import { createClassifier } from './classification';
import type { Classifier, IntentModel } from './classification/types';
import type { ClassifierStrategy } from './config';
import { getContext, runWithContextAsync, type RequestContext } from './context';
import { PipelineError } from './errors';
import { monotonicTimestamp, newRecordId, newThreadId } from './ids';
import { describeInput, readInputFile } from './input';
import { logger } from './logger';
import { documentsProcessedCounter } from './metrics';
import type { RecordStore } from './store/types';
import { summarizeThread } from './store/thread-context';
import { DocumentTextReader, type PdfTextExtractor } from './text/reader';
import type {
  ClassificationResult,
  ExtractionResult,
  InputDocument,
  ProcessingRecord,
  RecordStatus,
  ThreadContext,
} from './types';

export interface OrchestratorDeps {
  classifier: Classifier;
  registry: AgentRegistry;
  store: RecordStore;
}

function recordStatus(classification: ClassificationResult, extraction: ExtractionResult): RecordStatus {
  return extraction.anomalies.length === 0 && classification.method !== 'fallback' ? 'COMPLETE' : 'PARTIAL';
}

export class Orchestrator {
  private readonly classifier: Classifier;
  private readonly registry: AgentRegistry;
  private readonly store: RecordStore;

  constructor(deps: OrchestratorDeps) {
    this.classifier = deps.classifier;
    this.registry = deps.registry;
    this.store = deps.store;
  }

  async process(input: InputDocument): Promise<ProcessingRecord> {
    const threadId = input.threadId ?? newThreadId();
    const context: RequestContext = {
      correlationId: getContext()?.correlationId ?? ulid(),
      threadId,
    };

    return runWithContextAsync(context, async () => {
      const startTime = Date.now();

      const classification = await this.classifier.classify(input);
      const agent = this.registry.resolve(classification.format, classification.intent);
      const extraction = await agent.extract(input, classification);

      const record: ProcessingRecord = {
        record_id: newRecordId(),
        thread_id: threadId,
        status: recordStatus(classification, extraction),
        input: describeInput(input),
        classification,
        extraction,
        created_at: monotonicTimestamp(),
      };
      Object.freeze(record);
      context.recordId = record.record_id;

      try {
        await this.store.append(record);
      } catch (error) {
        logger.error('Failed to append processing record', error, {
          record_id: record.record_id,
        });
        throw new PipelineError('store_unavailable', 'Processing record could not be stored', {
          cause: error,
        });
      }

      documentsProcessedCounter.inc({
        format: classification.format,
        intent: classification.intent,
        status: record.status,
      });

      logger.info('Document processed', {
        record_id: record.record_id,
        format: classification.format,
        intent: classification.intent,
        agent: agent.name,
        status: record.status,
        duration_ms: Date.now() - startTime,
      });

      return record;
    });
  }

  /**
   * Process a file from disk; its basename is the filename hint.
   */
  async processFile(filePath: string, threadId?: string): Promise<ProcessingRecord> {
    const input = await readInputFile(filePath, threadId);
    return this.process(input);
  }

  getRecord(recordId: string): Promise<ProcessingRecord | null> {
    return this.store.get(recordId);
  }

  listThread(threadId: string): Promise<ProcessingRecord[]> {
    return this.store.listByThread(threadId);
  }

  async getThreadContext(threadId: string): Promise<ThreadContext | null> {
    return summarizeThread(await this.store.listByThread(threadId));
  }

  getHistory(limit: number): Promise<ProcessingRecord[]> {
    return this.store.listRecent(limit);
  }
}

export interface PipelineOptions {
  store: RecordStore;
  strategy?: ClassifierStrategy;
  intentModel?: IntentModel;
  pdfExtractor?: PdfTextExtractor;
  classificationTimeoutMs?: number;
}

/**
 * Wire reader, classifier, agents and registry around a store.
 */
export function createPipeline(options: PipelineOptions): Orchestrator {
  const reader = new DocumentTextReader(options.pdfExtractor);
  const classifier = createClassifier({
    reader,
    strategy: options.strategy,
    intentModel: options.intentModel,
    timeoutMs: options.classificationTimeoutMs,
  });
  const registry = new AgentRegistry(createAgents(reader));

  return new Orchestrator({ classifier, registry, store: options.store });
}
