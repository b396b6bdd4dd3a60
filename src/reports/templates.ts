import { errorMessage, NotFoundError, ValidationError } from '../types/errors';
import { SnapshotStore } from '../db/database';
import { loadSnapshot, persistSnapshot, reviveDate } from '../db/snapshot';
import { Clock, systemClock } from '../utils/clock';
import { logger } from '../utils/logger';
import { ReportConfig } from './types';
import { validateReportConfig } from './validation';

export interface ReportTemplate {
  name: string;
  description?: string;
  config: ReportConfig;
  builtIn: boolean;
  createdAt: Date;
  updatedAt: Date;
}

interface StoredTemplate {
  name: string;
  description?: string;
  config: unknown;
  createdAt: string;
  updatedAt: string;
}

interface TemplatesDocument {
  templates: StoredTemplate[];
  lastUpdated: string;
}

const SNAPSHOT = 'report_templates';
const TEMPLATE_NAME = /^[\w-]+$/;

const BUILT_IN_TEMPLATES: ReadonlyArray<{ description: string; config: ReportConfig }> = [
  {
    description: 'Today at a glance',
    config: {
      name: 'daily-review',
      dateRange: 'today',
      sections: [
        { name: 'Summary', type: 'summary' },
        { name: 'Recommendations', type: 'recommendations' },
      ],
    },
  },
  {
    description: 'The last seven days against the week before',
    config: {
      name: 'weekly-review',
      dateRange: 'last_7_days',
      sections: [
        { name: 'Summary', type: 'summary' },
        { name: 'Productivity', type: 'productivity_analysis' },
        { name: 'Week over week', type: 'comparison', parameters: { kind: 'periods', granularity: 'weekly', count: 1 } },
        { name: 'Focus trend', type: 'visualization', parameters: { chart: 'focus_trend' } },
        { name: 'Recommendations', type: 'recommendations' },
      ],
    },
  },
];

function builtInTemplate(entry: { description: string; config: ReportConfig }): ReportTemplate {
  const epoch = new Date(0);
  return {
    name: entry.config.name,
    description: entry.description,
    config: entry.config,
    builtIn: true,
    createdAt: epoch,
    updatedAt: epoch,
  };
}

/**
 * Named report configurations, persisted as one snapshot.
 * Built-in templates are available until a saved template replaces them.
 */
export class TemplateStore {
  private readonly log = logger.scoped('templates');
  private readonly templates = new Map<string, ReportTemplate>();

  constructor(
    private readonly snapshots: SnapshotStore | null = null,
    private readonly clock: Clock = systemClock
  ) {
    for (const entry of BUILT_IN_TEMPLATES) {
      this.templates.set(entry.config.name, builtInTemplate(entry));
    }
    this.load();
  }

  saveTemplate(name: string, config: unknown, description?: string): ReportTemplate {
    if (!TEMPLATE_NAME.test(name)) {
      throw new ValidationError(`Template names may only contain letters, digits, "_" and "-": ${name}`, 'name');
    }

    const validated = validateReportConfig(config);
    const now = this.clock();
    const existing = this.templates.get(name);
    const template: ReportTemplate = {
      name,
      description: description ?? existing?.description,
      config: validated,
      builtIn: false,
      createdAt: existing && !existing.builtIn ? existing.createdAt : now,
      updatedAt: now,
    };

    this.templates.set(name, template);
    this.persist();
    this.log.debug(`Saved template ${name}`);
    return template;
  }

  /**
   * @throws NotFoundError when no template has this name
   */
  loadTemplate(name: string): ReportTemplate {
    const template = this.templates.get(name);
    if (!template) {
      throw new NotFoundError('template', name);
    }
    return template;
  }

  listTemplates(): ReportTemplate[] {
    return [...this.templates.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Remove a saved template. Returns false when there was nothing to remove.
   */
  deleteTemplate(name: string): boolean {
    const template = this.templates.get(name);
    if (!template || template.builtIn) {
      return false;
    }

    this.templates.delete(name);
    const builtIn = BUILT_IN_TEMPLATES.find((entry) => entry.config.name === name);
    if (builtIn) {
      this.templates.set(name, builtInTemplate(builtIn));
    }

    this.persist();
    return true;
  }

  private load(): void {
    const document = loadSnapshot<TemplatesDocument>(this.snapshots, SNAPSHOT, this.log);
    if (!document || !Array.isArray(document.templates)) {
      return;
    }

    for (const stored of document.templates) {
      try {
        const createdAt = reviveDate(stored.createdAt) ?? this.clock();
        this.templates.set(stored.name, {
          name: stored.name,
          description: stored.description,
          config: validateReportConfig(stored.config),
          builtIn: false,
          createdAt,
          updatedAt: reviveDate(stored.updatedAt) ?? createdAt,
        });
      } catch (error) {
        this.log.warning(`Skipping invalid template ${stored.name}: ${errorMessage(error)}`);
      }
    }
  }

  private persist(): void {
    const templates = [...this.templates.values()]
      .filter((template) => !template.builtIn)
      .map((template) => ({
        name: template.name,
        description: template.description,
        config: template.config,
        createdAt: template.createdAt.toISOString(),
        updatedAt: template.updatedAt.toISOString(),
      }));

    persistSnapshot(this.snapshots, SNAPSHOT, { templates, lastUpdated: this.clock().toISOString() }, this.log);
  }
}
