import { readFileSync } from 'node:fs';
import path from 'node:path';
import { isDeepStrictEqual } from 'node:util';

import { noopLogger, type StructuredLogger } from '@stackwatch/core/logging';
import { formatUnknownError } from '@stackwatch/core/reporting';

import type { DefinitionValidatorPort } from '../domain/ports/validation.js';
import { parseTemplate } from '../providers/template-parser.js';

export interface DefinitionValidatorOptions {
  /** When `false`, any parseable content validates, changed or not. */
  readonly detectChange?: boolean;
  /** Take the first snapshot at construction so the first edit is compared against it. */
  readonly initialize?: boolean;
  readonly logger?: StructuredLogger;
  readonly readTextFile?: (filePath: string) => string;
}

/**
 * Decides whether a template or API definition file changed in a way worth acting on.
 *
 * Each call re-reads and parses the file and compares the parsed structure with the last
 * snapshot, so whitespace, comment, and key order edits do not validate.
 */
export class DefinitionValidator implements DefinitionValidatorPort {
  readonly filePath: string;
  private readonly detectChange: boolean;
  private readonly logger: StructuredLogger;
  private readonly readTextFile: (filePath: string) => string;
  private snapshot: unknown;

  constructor(filePath: string, options: DefinitionValidatorOptions = {}) {
    this.filePath = path.resolve(filePath);
    this.detectChange = options.detectChange ?? true;
    this.logger = options.logger ?? noopLogger;
    this.readTextFile = options.readTextFile ?? ((target) => readFileSync(target, 'utf8'));
    if (options.initialize ?? true) {
      this.validate();
    }
  }

  /**
   * @returns `true` when the file parses and, with change detection on, differs from the previous
   *   snapshot. A missing or unparsable file returns `false` and keeps the previous snapshot.
   */
  validate(): boolean {
    const previous = this.snapshot;
    const parsed = this.readDefinition();
    if (parsed === undefined) {
      return false;
    }
    this.snapshot = parsed;
    return this.detectChange ? !isDeepStrictEqual(previous, parsed) : true;
  }

  private readDefinition(): Readonly<Record<string, unknown>> | undefined {
    let text: string;
    try {
      text = this.readTextFile(this.filePath);
    } catch (error) {
      this.logger.log({
        level: 'debug',
        name: 'stackwatch.sync',
        event: 'definition.unreadable',
        data: { path: this.filePath, reason: formatUnknownError(error) },
      });
      return undefined;
    }

    try {
      return parseTemplate(text);
    } catch (error) {
      this.logger.log({
        level: 'debug',
        name: 'stackwatch.sync',
        event: 'definition.invalid',
        data: { path: this.filePath, reason: formatUnknownError(error) },
      });
      return undefined;
    }
  }
}
