import type { Answer, AnsweredAnswer } from '../types/evidence.js';
import type { FactGroup, QueryResult, TemplateBindings } from '../types/template.js';
import type { ReasonerConfig, SessionStats } from '../types/index.js';
import { KnowledgeGraph } from './knowledge-graph.js';
import { TemplateRegistry } from './template-registry.js';
import { QueryEngine } from './query-engine.js';
import { Retriever, type RetrieveOptions } from './retriever.js';
import {
  ReasoningController,
  type AskOptions,
  type RegenerateOptions,
} from './reasoning-controller.js';
import { ReasonerError } from './errors.js';
import { AuditLogService } from '../audit/audit-log-service.js';
import { GraphPersistence } from '../persistence/graph-persistence.js';
import { loadGraphFile } from '../persistence/graph-files.js';
import { loadTemplatesFromFile } from '../dsl/yaml/template-loader.js';
import type { GenerationError } from '../completion/errors.js';
import {
  ComplianceEvaluator,
  type ComplianceEvaluation,
  type EvaluateOptions,
} from '../evaluation/compliance-evaluator.js';

const AUDIT_SOURCE = 'session';

/**
 * Wires the graph, templates, retrieval and the controller together.
 *
 * `start()` loads every configured source into a fresh graph and freezes
 * it; from then on the session only reads, so concurrent questions never
 * see a half-built graph.
 *
 * @example
 * ```typescript
 * const session = await ReasoningSession.start({
 *   completion: new HttpCompletionService({ apiKey: process.env.OPENAI_API_KEY ?? '' }),
 *   graphFiles: ['./data/demo-graph.triples'],
 *   templateFiles: ['./data/financial-templates.yaml'],
 * });
 *
 * const answer = await session.ask('Is transaction T002 compliant?');
 * await session.stop();
 * ```
 */
export class ReasoningSession {
  private readonly name: string;
  private readonly graph: KnowledgeGraph;
  private readonly registry: TemplateRegistry;
  private readonly engine: QueryEngine;
  private readonly retriever: Retriever;
  private readonly controller: ReasoningController;
  private readonly evaluator: ComplianceEvaluator;
  private readonly auditLog: AuditLogService | null;

  private running = false;
  private questionsAsked = 0;

  private constructor(
    name: string,
    graph: KnowledgeGraph,
    registry: TemplateRegistry,
    auditLog: AuditLogService | null,
    config: ReasonerConfig,
  ) {
    this.name = name;
    this.graph = graph;
    this.registry = registry;
    this.auditLog = auditLog;
    this.engine = new QueryEngine(graph, registry);
    this.retriever = new Retriever(
      graph,
      registry,
      this.engine,
      config.maxGroups !== undefined ? { maxGroups: config.maxGroups } : {},
    );
    this.controller = new ReasoningController({
      retriever: this.retriever,
      completion: config.completion,
      ...(config.generation !== undefined && { generation: config.generation }),
      audit: auditLog ?? undefined,
    });
    this.evaluator = new ComplianceEvaluator(graph, this.retriever, this.controller);
  }

  /**
   * Builds and freezes the graph, registers templates and starts auditing.
   *
   * @throws {GraphIntegrityError} When a graph source contradicts another
   * @throws {YamlLoadError} When a template file cannot be loaded
   * @throws {TemplateDefinitionError} On duplicate template names
   */
  static async start(config: ReasonerConfig): Promise<ReasoningSession> {
    const name = config.name ?? 'kg-reasoner';

    let auditLog: AuditLogService | null = null;
    if (config.audit) {
      auditLog = await AuditLogService.start(config.audit.adapter, {
        ...(config.audit.retentionMs !== undefined && { retentionMs: config.audit.retentionMs }),
        ...(config.audit.batchSize !== undefined && { batchSize: config.audit.batchSize }),
        ...(config.audit.flushIntervalMs !== undefined && { flushIntervalMs: config.audit.flushIntervalMs }),
        ...(config.audit.maxMemoryEntries !== undefined && { maxMemoryEntries: config.audit.maxMemoryEntries }),
      });
    }

    try {
      const graph = new KnowledgeGraph({ name });

      // Snapshot first, then files
      let persistence: GraphPersistence | null = null;
      if (config.persistence) {
        persistence = new GraphPersistence(config.persistence.adapter, {
          ...(config.persistence.key !== undefined && { key: config.persistence.key }),
          ...(config.persistence.schemaVersion !== undefined && { schemaVersion: config.persistence.schemaVersion }),
        });
        const summary = await persistence.load(graph);
        if (summary) {
          auditLog?.record('graph_loaded', { source: `storage:${persistence.getKey()}`, ...summary }, { source: AUDIT_SOURCE });
        }
      }

      for (const file of config.graphFiles ?? []) {
        const summary = await loadGraphFile(graph, file);
        auditLog?.record('graph_loaded', { source: file, ...summary }, { source: AUDIT_SOURCE });
      }

      if (persistence && config.persistence?.saveOnStart) {
        await persistence.save(graph);
      }

      graph.freeze();
      auditLog?.record('graph_frozen', { ...graph.stats() }, { source: AUDIT_SOURCE });

      const registry = new TemplateRegistry(config.templates ?? []);
      for (const file of config.templateFiles ?? []) {
        const templates = await loadTemplatesFromFile(file);
        registry.registerAll(templates);
        auditLog?.record('templates_loaded', {
          file,
          templates: templates.map(t => t.name),
        }, { source: AUDIT_SOURCE });
      }

      const session = new ReasoningSession(name, graph, registry, auditLog, config);
      session.running = true;

      auditLog?.record('session_started', {
        name,
        entities: graph.stats().entities,
        relations: graph.size,
        templates: registry.size,
      }, { source: AUDIT_SOURCE });

      return session;
    } catch (err) {
      await auditLog?.stop();
      throw err;
    }
  }

  // ---------------------------------------------------------------------------
  // Questions
  // ---------------------------------------------------------------------------

  /**
   * @throws {GenerationError} When the fact set is answerable but generation fails
   */
  async ask(question: string, options: AskOptions = {}): Promise<Answer> {
    this.ensureRunning();
    this.questionsAsked++;
    return this.controller.ask(question, options);
  }

  async regenerate(error: GenerationError, options: RegenerateOptions = {}): Promise<AnsweredAnswer> {
    this.ensureRunning();
    return this.controller.regenerate(error, options);
  }

  /**
   * Fact groups a question would be answered from, without generation.
   */
  retrieve(question: string, options: RetrieveOptions = {}): FactGroup[] {
    this.ensureRunning();
    return this.retriever.retrieve(question, options);
  }

  /**
   * Runs a template directly.
   */
  query(templateName: string, bindings: Readonly<TemplateBindings> = {}): QueryResult {
    this.ensureRunning();
    return this.engine.run(templateName, bindings);
  }

  async evaluateCompliance(transactionId: string, options: EvaluateOptions = {}): Promise<ComplianceEvaluation> {
    this.ensureRunning();
    this.questionsAsked++;
    return this.evaluator.evaluate(transactionId, options);
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  getGraph(): KnowledgeGraph {
    return this.graph;
  }

  getTemplates(): TemplateRegistry {
    return this.registry;
  }

  getAuditLog(): AuditLogService | null {
    return this.auditLog;
  }

  getStats(): SessionStats {
    return {
      graph: this.graph.stats(),
      templates: this.registry.size,
      questionsAsked: this.questionsAsked,
      ...(this.auditLog !== null && { audit: this.auditLog.getStats() }),
    };
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Records the stop and flushes the audit log. Idempotent.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    this.auditLog?.record('session_stopped', {
      name: this.name,
      questionsAsked: this.questionsAsked,
    }, { source: AUDIT_SOURCE });

    await this.auditLog?.stop();
  }

  private ensureRunning(): void {
    if (!this.running) {
      throw new ReasonerError(`ReasoningSession "${this.name}" is not running`);
    }
  }
}
