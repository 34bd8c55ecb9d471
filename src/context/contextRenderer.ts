import nunjucks from 'nunjucks';
import type { Environment } from 'nunjucks';
import path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import { createLogger, NAMESPACES } from '../logging.js';
import type { ContextPackage } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const rendererLog = createLogger(NAMESPACES.context.renderer);

export const DEFAULT_TEMPLATE_DIR = path.join(__dirname, '..', '..', 'templates');

/**
 * Turns a context package into prompt text. Templates are plain text, so
 * autoescaping is off.
 */
export class ContextRenderer {
  private readonly env: Environment;

  constructor(templateDir: string = DEFAULT_TEMPLATE_DIR) {
    this.env = new nunjucks.Environment(new nunjucks.FileSystemLoader(templateDir), {
      autoescape: false,
      trimBlocks: true,
      lstripBlocks: true
    });
  }

  render(pkg: ContextPackage, templateName: string = 'context.njk'): string {
    const text = this.env.render(templateName, { blocks: pkg.blocks, consumed: pkg.consumed, budget: pkg.budget });
    rendererLog(`rendered ${pkg.blocks.length} blocks into ${text.length} characters`);
    return text.trimEnd();
  }
}

let defaultRenderer: ContextRenderer | undefined;

/** Render with the bundled `context.njk` template. */
export function renderContext(pkg: ContextPackage): string {
  defaultRenderer ??= new ContextRenderer();
  return defaultRenderer.render(pkg);
}
