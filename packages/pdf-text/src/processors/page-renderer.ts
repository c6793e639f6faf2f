import type { LoggerMethods } from '@ordoscan/logger';

import type { ToolConfig } from '../config/tool-config';

import { resolveToolBinary, spawnAsync } from '@ordoscan/shared';
import { existsSync, mkdirSync, readdirSync } from 'node:fs';
import { join } from 'node:path';

import { PAGE_RENDERER } from '../config/constants';
import { ConfigurationError } from '../errors/configuration-error';
import { RasterizationError } from '../errors/text-acquisition-error';
import { describeToolFailure } from '../utils/tool-failure';

/** Result of page rendering */
export interface PageRenderResult {
  /** Total number of pages rendered */
  pageCount: number;
  /** Absolute path to the pages directory */
  pagesDir: string;
  /** Rendered page file paths, in page order */
  pageFiles: string[];
}

/** Options for page rendering */
export interface PageRendererOptions {
  /** DPI for rendered images (default: 400) */
  dpi?: number;
}

/** pdftoppm pads page numbers to the width of the page count (page-01.png) */
const PAGE_FILE_PATTERN = new RegExp(
  `^${PAGE_RENDERER.PAGE_FILE_ROOT}-(\\d+)\\.png$`,
);

/**
 * Renders PDF pages to individual PNG images using Poppler's pdftoppm.
 *
 * The Poppler directory must be configured: scanned documents are the only
 * reason to rasterize, and a missing location is reported as a
 * ConfigurationError instead of a spawn failure.
 *
 * ## System Requirements
 * - Poppler utils (`pdftoppm`) under POPPLER_PATH
 */
export class PageRenderer {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly config: ToolConfig = {},
  ) {}

  /**
   * Render all pages of a PDF to individual PNG files.
   *
   * @param pdfPath - Path to the source PDF file
   * @param outputDir - Directory where the pages/ subdirectory will be created
   * @param options - Rendering options
   * @returns Render result with page count and file paths
   */
  async renderPages(
    pdfPath: string,
    outputDir: string,
    options?: PageRendererOptions,
  ): Promise<PageRenderResult> {
    if (!this.config.popplerPath) {
      throw new ConfigurationError(
        'POPPLER_PATH is not set; it is required to render scanned PDFs for OCR',
      );
    }

    const dpi = options?.dpi ?? PAGE_RENDERER.DPI;
    const pagesDir = join(outputDir, 'pages');

    if (!existsSync(pagesDir)) {
      mkdirSync(pagesDir, { recursive: true });
    }

    this.logger.debug(`[PageRenderer] Rendering PDF at ${dpi} DPI...`);

    const result = await spawnAsync(
      resolveToolBinary('pdftoppm', this.config.popplerPath),
      [
        '-r',
        dpi.toString(),
        '-png',
        pdfPath,
        join(pagesDir, PAGE_RENDERER.PAGE_FILE_ROOT),
      ],
    );

    if (result.code !== 0) {
      throw new RasterizationError(
        `[PageRenderer] Failed to render PDF pages: ${describeToolFailure(result)}`,
      );
    }

    const pageFiles = readdirSync(pagesDir)
      .map((file) => ({ file, match: PAGE_FILE_PATTERN.exec(file) }))
      .flatMap(({ file, match }) =>
        match ? [{ file, page: parseInt(match[1], 10) }] : [],
      )
      .sort((a, b) => a.page - b.page)
      .map(({ file }) => join(pagesDir, file));

    this.logger.debug(
      `[PageRenderer] Rendered ${pageFiles.length} pages to ${pagesDir}`,
    );

    return {
      pageCount: pageFiles.length,
      pagesDir,
      pageFiles,
    };
  }
}
