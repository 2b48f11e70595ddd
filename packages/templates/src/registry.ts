import type { Logger } from '@tessera/logger';
import { type Limits, type RegistryOptions, resolveRegistryOptions } from './config';
import { ConfigurationError, RenderError, UnknownTemplateError } from './errors';
import { type Formatter, isReservedFormatter } from './formatters/index';
import { Template } from './template';

/**
 * A set of named templates sharing one formatter registry.
 *
 * Templates are compiled when added, so syntax errors surface at
 * registration time. The formatters are read by every render; replacing a
 * formatter while a render is running is the caller's responsibility.
 *
 * @example
 * ```typescript
 * const registry = new TemplateRegistry();
 * registry.addFormatter('upper', (value) => format(value).toUpperCase());
 * registry.addTemplate('greeting', 'Hello, {{ name | upper }}!');
 * registry.render('greeting', { name: 'world' }); // 'Hello, WORLD!'
 * ```
 */
export class TemplateRegistry {
  private readonly templates = new Map<string, Template>();
  private readonly formatters: Record<string, Formatter>;
  private readonly limits: Limits;
  private readonly logger: Logger | null;

  constructor(options: RegistryOptions = {}) {
    const resolved = resolveRegistryOptions(options);
    this.limits = resolved.limits;
    this.logger = resolved.logger;
    this.formatters = {};
    for (const [name, formatter] of Object.entries(resolved.formatters)) {
      this.addFormatter(name, formatter);
    }
  }

  /**
   * Compile and register a template; an existing template with the same
   * name is replaced.
   *
   * @throws LexerError | ParserError when the template does not compile
   */
  addTemplate(name: string, text: string): void {
    const template = Template.compile(text, {
      limits: this.limits,
      ...(this.logger ? { logger: this.logger.child({ template: name }) } : {}),
    });
    this.templates.set(name, template);
    this.logger?.debug('template_registered', { template: name });
  }

  hasTemplate(name: string): boolean {
    return this.templates.has(name);
  }

  /**
   * Register a formatter available to every template in the registry.
   *
   * @throws ConfigurationError for the reserved `format` name
   */
  addFormatter(name: string, formatter: Formatter): void {
    if (isReservedFormatter(name)) {
      throw new ConfigurationError('Invalid formatter', [`'${name}' is a reserved formatter name`]);
    }
    this.formatters[name] = formatter;
    this.logger?.debug('formatter_registered', { formatter: name });
  }

  /**
   * Render a registered template.
   *
   * @throws UnknownTemplateError when no template has that name
   * @throws RenderError when rendering fails
   */
  render(name: string, data: unknown): string {
    const template = this.templates.get(name);
    if (template === undefined) {
      throw new UnknownTemplateError(name);
    }

    try {
      return template.render(data, { formatters: this.formatters });
    } catch (error) {
      if (error instanceof RenderError) {
        this.logger?.warn('template_render_failed', {
          template: name,
          kind: error.kind,
          path: error.path.join('.'),
          depth: error.depth,
        });
      }
      throw error;
    }
  }
}
