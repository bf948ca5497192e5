/**
 * Upload page
 */

import { Router } from 'express';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

const TEMPLATE_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '..', '..', '..', 'templates', 'index.html'
);

const CDN_PLACEHOLDER = '{{CDN_BASE_URL}}';

/**
 * Render the page with the CDN base URL embedded as a JSON string literal
 */
export function renderUploadPage(template: string, cdnBaseUrl: string): string {
  const literal = JSON.stringify(cdnBaseUrl).replace(/</g, '\\u003c');
  return template.split(CDN_PLACEHOLDER).join(literal);
}

export function createHomeRoutes(options: { cdnBaseUrl: string; templatePath?: string }): Router {
  const router = Router();
  const template = fs.readFileSync(options.templatePath || TEMPLATE_PATH, 'utf-8');
  const page = renderUploadPage(template, options.cdnBaseUrl);

  router.get('/', (_req, res) => {
    res.type('html').send(page);
  });

  return router;
}
