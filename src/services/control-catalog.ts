/**
 * Control catalog: Service
 *
 * Read-only lookup of assessment controls, indexed by id and by domain.
 * Every sequence handed out is a fresh copy.
 */
import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { DataLoadError, errorMessage } from '../errors.js';
import { ControlSchema, type CatalogSummary, type Control } from '../models/control.js';

const CatalogDocumentSchema = z.union([
  z.array(z.unknown()),
  z.object({ controls: z.array(z.unknown()) }),
]);

function parseDocument(raw: string, path: string): unknown {
  const ext = extname(path).toLowerCase();
  try {
    return ext === '.yaml' || ext === '.yml' ? yaml.load(raw) : JSON.parse(raw);
  } catch (err: unknown) {
    throw new DataLoadError(`Could not parse control catalog ${path}: ${errorMessage(err)}`);
  }
}

export class ControlCatalog {
  private readonly controls: Control[];
  private readonly byId = new Map<string, Control>();
  private readonly byDomain = new Map<string, Control[]>();

  private constructor(controls: Control[]) {
    this.controls = controls;
    for (const control of controls) {
      if (this.byId.has(control.controlId)) {
        throw new DataLoadError(`Duplicate control id: ${control.controlId}`);
      }
      this.byId.set(control.controlId, control);

      const domainControls = this.byDomain.get(control.domain);
      if (domainControls) {
        domainControls.push(control);
      } else {
        this.byDomain.set(control.domain, [control]);
      }
    }
  }

  /** Load a catalog from a YAML (.yaml/.yml) or JSON file. */
  static async load(path: string): Promise<ControlCatalog> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (err: unknown) {
      throw new DataLoadError(`Controls file not found: ${path} (${errorMessage(err)})`);
    }

    const document = CatalogDocumentSchema.safeParse(parseDocument(raw, path));
    if (!document.success) {
      throw new DataLoadError(`Invalid control catalog ${path}: expected a list of controls or a "controls" array`);
    }
    const records = Array.isArray(document.data) ? document.data : document.data.controls;
    return ControlCatalog.fromRecords(records);
  }

  /** Validate raw records and build a catalog from them. */
  static fromRecords(records: readonly unknown[]): ControlCatalog {
    const controls = records.map((record, index) => {
      const parsed = ControlSchema.safeParse(record);
      if (!parsed.success) {
        const fields = parsed.error.issues.map((i) => i.path.join('.') || '(record)').join(', ');
        throw new DataLoadError(`Invalid control record at index ${index}: ${fields}`);
      }
      return Object.freeze(parsed.data);
    });
    return new ControlCatalog(controls);
  }

  all(): Control[] {
    return [...this.controls];
  }

  getById(controlId: string): Control | undefined {
    return this.byId.get(controlId);
  }

  /** Controls of a domain in catalog order; empty for an unknown domain. */
  getByDomain(domain: string): Control[] {
    return [...(this.byDomain.get(domain) ?? [])];
  }

  count(domain: string): number {
    return this.byDomain.get(domain)?.length ?? 0;
  }

  domains(): string[] {
    return Array.from(this.byDomain.keys());
  }

  search(query: string, domain?: string): Control[] {
    const needle = query.toLowerCase();
    const pool = domain !== undefined ? this.byDomain.get(domain) ?? [] : this.controls;
    return pool.filter(
      (c) =>
        c.title.toLowerCase().includes(needle) ||
        c.requirement.toLowerCase().includes(needle) ||
        c.discussion.toLowerCase().includes(needle),
    );
  }

  summary(): CatalogSummary {
    const domains: Record<string, number> = {};
    for (const [domain, controls] of this.byDomain) {
      domains[domain] = controls.length;
    }
    return {
      totalControls: this.controls.length,
      domainCount: this.byDomain.size,
      domains,
    };
  }
}
