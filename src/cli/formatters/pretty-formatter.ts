/**
 * Pretty formátter pro CLI výstup - lidsky čitelný formát.
 */

import type { FormattableData, ValidationReport } from '../types.js';
import type { OutputFormatter } from '../types.js';
import type { Answer } from '../../types/evidence.js';
import type { EvidenceFact, Fact } from '../../types/fact.js';
import type { FactGroup, QueryResult, TemplateBindings } from '../../types/template.js';
import type { ComplianceEvaluation } from '../../evaluation/compliance-evaluator.js';
import { formatEvidenceFact } from '../../evaluation/prompt-builder.js';
import { formatObject, formatScalar } from '../../utils/relation-object.js';
import { formatDuration } from '../../utils/duration-parser.js';
import { colorize, statusLabel, type ColorName } from '../utils/output.js';

export class PrettyFormatter implements OutputFormatter {
  constructor(private readonly useColors: boolean = true) {}

  format(data: FormattableData): string {
    switch (data.type) {
      case 'answer':
        return this.formatAnswer(data.data);
      case 'groups':
        return this.formatGroups(data.data);
      case 'query':
        return this.formatQuery(data.data);
      case 'evaluation':
        return this.formatEvaluation(data.data);
      case 'validation':
        return this.formatValidation(data.data);
      case 'error':
        return this.color('✗ ', 'red') + this.color(String(data.data), 'red');
      case 'message':
        return typeof data.data === 'string' ? data.data : JSON.stringify(data.data, null, 2);
    }
  }

  private formatAnswer(answer: Answer): string {
    const lines: string[] = [
      `${statusLabel(answer.status, this.useColors)} ${answer.text}`,
    ];

    switch (answer.status) {
      case 'unknown':
        if (answer.reason === 'no_matching_template') {
          lines.push(this.color('No query template matches the question.', 'dim'));
        }
        if (answer.missing.length > 0) {
          lines.push('', this.color('Missing facts:', 'yellow'));
          for (const m of answer.missing) {
            lines.push(`  - ${m.subject ?? m.term} ${m.predicate} ${this.color(`(${m.template})`, 'dim')}`);
          }
        }
        break;

      case 'inconclusive':
        lines.push('', this.color('Conflicts:', 'magenta'));
        for (const conflict of answer.conflicts) {
          lines.push(`  ${conflict.subject} ${conflict.predicate}:`);
          for (const value of conflict.values) {
            const sources = value.sources.map(s => `${s.relationId} from ${s.origin}`).join(', ');
            lines.push(`    ${formatObject(value.value)} ${this.color(`[${sources}]`, 'dim')}`);
          }
        }
        break;

      case 'answerable':
        break;
    }

    if (answer.evidence.length > 0) {
      lines.push('', this.color('Evidence:', 'cyan'));
      lines.push(...this.evidenceLines(answer.evidence));
    }

    lines.push('', this.color(`${answer.correlationId} · ${formatDuration(answer.durationMs)}`, 'dim'));
    return lines.join('\n');
  }

  private formatGroups(groups: readonly FactGroup[]): string {
    if (groups.length === 0) {
      return this.color('No query template matches the question.', 'dim');
    }

    const lines: string[] = [];
    for (const group of groups) {
      lines.push(
        `${this.color(group.template, 'bold')} ${this.formatBindings(group.bindings)} ${this.color(`score ${group.score}`, 'dim')}`,
      );
      if (group.facts.length === 0) {
        lines.push(`  ${this.color('(no facts)', 'dim')}`);
      } else {
        lines.push(...this.evidenceLines(group.facts));
      }
      lines.push('');
    }
    return lines.join('\n').trimEnd();
  }

  private formatQuery(result: QueryResult): string {
    const lines: string[] = [
      `${this.color(result.template, 'bold')} ${this.formatBindings(result.bindings)}`,
      `${this.color('Solutions:', 'cyan')} ${result.solutions.length}`,
      `${this.color('Facts:', 'cyan')}     ${result.facts.length}`,
    ];

    if (result.facts.length > 0) {
      lines.push('');
      lines.push(...result.facts.map(f => `  ${this.formatFact(f)}`));
    }
    return lines.join('\n');
  }

  private formatEvaluation(evaluation: ComplianceEvaluation): string {
    const verdict = (value: boolean | null): string =>
      value === null ? this.color('n/a', 'dim') : value ? 'compliant' : 'non-compliant';

    const lines: string[] = [
      this.color(`Transaction ${evaluation.transaction}`, 'bold'),
      `${this.color('Evidence:', 'cyan')}     ${statusLabel(evaluation.status, this.useColors)}`,
      `${this.color('Ground truth:', 'cyan')} ${verdict(evaluation.groundTruth)}`,
      `${this.color('Model:', 'cyan')}        ${verdict(evaluation.modelLabel)}`,
    ];

    if (evaluation.correct !== null) {
      lines.push(evaluation.correct ? this.color('✓ correct', 'green') : this.color('✗ incorrect', 'red'));
    }
    if (evaluation.explanation !== null) {
      lines.push('', evaluation.explanation);
    }
    if (evaluation.parseError !== null) {
      lines.push('', this.color(`Rejected response: ${evaluation.parseError}`, 'red'));
    }
    return lines.join('\n');
  }

  private formatValidation(report: ValidationReport): string {
    const noun = report.type === 'templates' ? 'Templates' : 'Statements';
    const lines: string[] = [
      this.color(`File: ${report.file}`, 'bold'),
      `${noun}: ${report.count}`,
      '',
    ];

    if (report.valid) {
      lines.push(this.color('✓ Validation passed', 'green'));
    } else {
      lines.push(this.color(`✗ Validation failed (${report.errors.length} error(s))`, 'red'));
      for (const e of report.errors) {
        lines.push(`  ✗ ${e}`);
      }
    }
    return lines.join('\n');
  }

  private evidenceLines(facts: readonly EvidenceFact[]): string[] {
    return facts.map(f => `  ${formatEvidenceFact(f)}`);
  }

  private formatFact(fact: Fact): string {
    return `${fact.subject} ${fact.predicate} ${formatObject(fact.value)} ${this.color(`[${fact.source.relationId}]`, 'dim')}`;
  }

  private formatBindings(bindings: Readonly<TemplateBindings>): string {
    const entries = Object.entries(bindings).map(([k, v]) => `${k}=${formatScalar(v)}`);
    return this.color(`(${entries.join(', ')})`, 'dim');
  }

  private color(text: string, color: ColorName): string {
    return colorize(text, color, this.useColors);
  }
}
