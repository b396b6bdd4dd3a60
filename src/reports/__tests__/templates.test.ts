import { TemplateStore } from '../templates';
import { NotFoundError, ValidationError } from '../../types/errors';
import { MemorySnapshots, jan } from '../../__tests__/fixtures';

describe('TemplateStore', () => {
  let consoleErrorSpy: jest.SpyInstance;
  const clock = (): Date => jan(15, 9);
  const focusOnly = {
    name: 'Focus only',
    dateRange: 'last_30_days',
    sections: [{ name: 'Focus', type: 'productivity_analysis' }],
  };

  beforeEach(() => {
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  it('should offer the built-in templates', () => {
    const store = new TemplateStore(null, clock);
    expect(store.listTemplates().map((template) => [template.name, template.builtIn])).toEqual([
      ['daily-review', true],
      ['weekly-review', true],
    ]);
    expect(store.loadTemplate('weekly-review').config.sections).toHaveLength(5);
  });

  it('should save, list and load a template', () => {
    const store = new TemplateStore(null, clock);
    const saved = store.saveTemplate('focus-only', focusOnly, 'Focus and nothing else');

    expect(saved).toMatchObject({ name: 'focus-only', description: 'Focus and nothing else', builtIn: false });
    expect(saved.createdAt).toEqual(jan(15, 9));
    expect(store.loadTemplate('focus-only').config.dateRange).toBe('last_30_days');
    expect(store.listTemplates().map((template) => template.name)).toEqual([
      'daily-review',
      'focus-only',
      'weekly-review',
    ]);
  });

  it('should reject bad names and invalid configs', () => {
    const store = new TemplateStore(null, clock);
    expect(() => store.saveTemplate('focus only', focusOnly)).toThrow(ValidationError);
    expect(() => store.saveTemplate('broken', { ...focusOnly, sections: [] })).toThrow(
      'Report config needs at least one section'
    );
  });

  it('should throw NotFoundError for an unknown template', () => {
    const store = new TemplateStore(null, clock);
    expect(() => store.loadTemplate('monthly')).toThrow(NotFoundError);
    expect(() => store.loadTemplate('monthly')).toThrow('Unknown template: monthly');
  });

  it('should restore a built-in after its replacement is deleted', () => {
    const store = new TemplateStore(null, clock);
    store.saveTemplate('daily-review', focusOnly);
    expect(store.loadTemplate('daily-review').builtIn).toBe(false);

    expect(store.deleteTemplate('daily-review')).toBe(true);
    expect(store.loadTemplate('daily-review').builtIn).toBe(true);
    expect(store.deleteTemplate('daily-review')).toBe(false);
    expect(store.deleteTemplate('missing')).toBe(false);
  });

  it('should persist saved templates only', () => {
    const snapshots = new MemorySnapshots();
    new TemplateStore(snapshots, clock).saveTemplate('focus-only', {
      ...focusOnly,
      dateRange: { start: jan(1, 0), end: jan(8, 0) },
    });

    const restored = new TemplateStore(snapshots, clock);
    const template = restored.loadTemplate('focus-only');
    expect(template.config.dateRange).toEqual({ start: jan(1, 0), end: jan(8, 0) });
    expect(template.createdAt).toEqual(jan(15, 9));

    const document = snapshots.readSnapshot<{ templates: Array<{ name: string }> }>('report_templates');
    expect(document?.templates.map((stored) => stored.name)).toEqual(['focus-only']);
  });

  it('should skip stored templates that no longer validate', () => {
    const snapshots = new MemorySnapshots();
    snapshots.writeSnapshot('report_templates', {
      templates: [
        { name: 'stale', config: { name: 'stale', dateRange: 'today', sections: [{ name: 'X', type: 'gone' }] }, createdAt: 'x', updatedAt: 'x' },
      ],
      lastUpdated: jan(1).toISOString(),
    });

    const store = new TemplateStore(snapshots, clock);
    expect(() => store.loadTemplate('stale')).toThrow(NotFoundError);
  });
});
