/**
 * Error hierarchy of the reasoner core.
 *
 * Integrity errors signal a construction bug and are not meant to be
 * recovered from. Query errors signal template misuse and are surfaced
 * to the caller unchanged. Evidentiary outcomes (unknown, inconclusive)
 * are never errors; see {@link Answer}.
 */

/** Common ancestor of every error thrown by kg-reasoner. */
export class ReasonerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ReasonerError';
  }
}

// ---------------------------------------------------------------------------
// Graph integrity
// ---------------------------------------------------------------------------

export class GraphIntegrityError extends ReasonerError {
  constructor(message: string) {
    super(message);
    this.name = 'GraphIntegrityError';
  }
}

/** An entity id is already registered with a different kind. */
export class DuplicateEntityError extends GraphIntegrityError {
  readonly entityId: string;
  readonly existingKind: string;
  readonly requestedKind: string;

  constructor(entityId: string, existingKind: string, requestedKind: string) {
    super(`Entity "${entityId}" already exists as ${existingKind}, cannot redeclare it as ${requestedKind}`);
    this.name = 'DuplicateEntityError';
    this.entityId = entityId;
    this.existingKind = existingKind;
    this.requestedKind = requestedKind;
  }
}

/** A relation references an entity id that is not in the graph. */
export class UnknownEntityError extends GraphIntegrityError {
  readonly entityId: string;

  constructor(entityId: string, role: 'subject' | 'object' | 'entity' = 'entity') {
    super(`Unknown ${role} entity "${entityId}"`);
    this.name = 'UnknownEntityError';
    this.entityId = entityId;
  }
}

/** addEntity() would silently replace an attribute value. */
export class AttributeOverwriteError extends GraphIntegrityError {
  readonly entityId: string;
  readonly attribute: string;

  constructor(entityId: string, attribute: string) {
    super(
      `Attribute "${attribute}" of entity "${entityId}" already has a different value; ` +
      'use updateAttribute() with provenance to record a correction',
    );
    this.name = 'AttributeOverwriteError';
    this.entityId = entityId;
    this.attribute = attribute;
  }
}

/** Mutation attempted after KnowledgeGraph.freeze(). */
export class GraphFrozenError extends GraphIntegrityError {
  constructor(graphName: string) {
    super(`Graph "${graphName}" is frozen and no longer accepts mutations`);
    this.name = 'GraphFrozenError';
  }
}

// ---------------------------------------------------------------------------
// Query misuse
// ---------------------------------------------------------------------------

export class QueryError extends ReasonerError {
  constructor(message: string) {
    super(message);
    this.name = 'QueryError';
  }
}

export class UnknownTemplateError extends QueryError {
  readonly templateName: string;

  constructor(templateName: string) {
    super(`Query template "${templateName}" is not registered`);
    this.name = 'UnknownTemplateError';
    this.templateName = templateName;
  }
}

export class MissingBindingError extends QueryError {
  readonly templateName: string;
  readonly missing: readonly string[];

  constructor(templateName: string, missing: readonly string[]) {
    super(`Template "${templateName}" is missing required binding(s): ${missing.join(', ')}`);
    this.name = 'MissingBindingError';
    this.templateName = templateName;
    this.missing = missing;
  }
}

/**
 * Binding values do not fit their declared parameters.
 * Collects every issue, like template parameter validation does.
 */
export class InvalidBindingError extends QueryError {
  readonly templateName: string;
  readonly issues: readonly string[];

  constructor(templateName: string, issues: readonly string[]) {
    super(`Template "${templateName}" received invalid bindings: ${issues.join('; ')}`);
    this.name = 'InvalidBindingError';
    this.templateName = templateName;
    this.issues = issues;
  }
}

/** A template definition itself is malformed (registration time). */
export class TemplateDefinitionError extends QueryError {
  readonly templateName: string;

  constructor(templateName: string, message: string) {
    super(`Template "${templateName}": ${message}`);
    this.name = 'TemplateDefinitionError';
    this.templateName = templateName;
  }
}
