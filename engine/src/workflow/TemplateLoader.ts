/**
 * Template Loader
 *
 * File I/O for workflow templates: reads YAML or JSON documents and returns
 * the raw template entries. Validation happens in the catalog, against the
 * unit registry.
 *
 * @module workflow
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { InvalidTemplateError, toError } from '../errors/index.js';
import { TemplateDocumentSchema } from './TemplateSchema.js';

export const DEFAULT_TEMPLATES_PATH = fileURLToPath(
  new URL('../../templates/default-templates.yaml', import.meta.url)
);

export class TemplateLoader {
  /**
   * Raw template entries of a YAML or JSON document
   */
  static parse(content: string, source: string): unknown[] {
    let document: unknown;
    try {
      // JSON is a subset of YAML
      document = YAML.parse(content);
    } catch (error) {
      throw InvalidTemplateError.schema(source, '', `not valid YAML/JSON: ${toError(error).message}`);
    }

    // A bare list or a single template is accepted as well
    if (Array.isArray(document)) {
      return document;
    }
    const parsed = TemplateDocumentSchema.safeParse(document);
    if (parsed.success) {
      return parsed.data.templates;
    }
    if (typeof document === 'object' && document !== null && 'steps' in document) {
      return [document];
    }
    throw InvalidTemplateError.schema(source, 'templates', 'expected a "templates" list');
  }

  static async fromFile(filePath: string): Promise<unknown[]> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      throw InvalidTemplateError.schema(filePath, '', `cannot read file: ${toError(error).message}`);
    }
    return TemplateLoader.parse(content, filePath);
  }

  /**
   * Templates shipped with the engine
   */
  static defaults(): Promise<unknown[]> {
    return TemplateLoader.fromFile(DEFAULT_TEMPLATES_PATH);
  }
}
