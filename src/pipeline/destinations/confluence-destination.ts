import { ConfluenceClient } from 'confluence.js';
import { UploadedArtifact } from '../../models/upload';
import {
  attachmentDownloadUrl,
  attachmentUploadUrl,
  createPage,
  pageUrl,
  updatePageBody,
} from '../../integrations/confluence-client';
import { formatSummaryLine } from '../summary-extractor';
import { PreparedDestination, PublishContext, PublishDestination } from '../publish-pipeline';

export interface ConfluenceDestinationOptions {
  baseUrl: string;
  spaceKey: string;
  titlePrefix: string;
  urlFile: string;
  now?: () => Date;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

export function buildPageTitle(prefix: string, context: PublishContext, timestamp: string): string {
  // Colons are not allowed in page titles.
  return `${prefix} v${context.version} (${context.summary.overallStatus}) - ${timestamp.replace(/:/g, '-')}`;
}

export function buildPageBody(context: PublishContext, timestamp: string): string {
  const color = context.summary.overallStatus === 'PASS' ? 'green' : 'red';
  return [
    `<h2>Test Report v${context.version}</h2>`,
    `<p><b>Date:</b> ${escapeHtml(timestamp)}</p>`,
    `<p><b>Status:</b> <span style="color:${color};font-weight:bold">${context.summary.overallStatus}</span></p>`,
    `<p><b>Summary:</b> ${escapeHtml(formatSummaryLine(context.summary))}</p>`,
    '<p>Attachments are available below.</p>',
  ].join('\n');
}

export function buildAttachmentSection(baseUrl: string, pageId: string, uploaded: UploadedArtifact[]): string {
  const links = uploaded.map(artifact => {
    const href = attachmentDownloadUrl(baseUrl, pageId, artifact.fileName);
    return `<p><a href="${escapeHtml(href)}">${escapeHtml(artifact.fileName)}</a></p>`;
  });
  return ['<h3>Attachments</h3>', ...links].join('\n');
}

/**
 * Publishes to a new Confluence page per run: the page is created first so
 * attachments have a parent, then rewritten with download links.
 */
export class ConfluenceDestination implements PublishDestination {
  readonly name = 'confluence';
  readonly urlFile: string;
  private readonly now: () => Date;

  constructor(
    private readonly confluence: ConfluenceClient,
    private readonly options: ConfluenceDestinationOptions
  ) {
    this.urlFile = options.urlFile;
    this.now = options.now ?? (() => new Date());
  }

  async prepare(context: PublishContext): Promise<PreparedDestination> {
    const timestamp = formatTimestamp(this.now());
    const title = buildPageTitle(this.options.titlePrefix, context, timestamp);
    const body = buildPageBody(context, timestamp);

    const page = await createPage(this.confluence, this.options.spaceKey, title, body);

    return {
      attachmentUrl: attachmentUploadUrl(this.options.baseUrl, page.id),
      successStatuses: [200, 201],
      finalize: async (uploaded) => {
        const linkedBody = `${body}\n${buildAttachmentSection(this.options.baseUrl, page.id, uploaded)}`;
        await updatePageBody(this.confluence, { id: page.id, title: page.title }, linkedBody);
        return pageUrl(this.options.baseUrl, this.options.spaceKey, page.id);
      },
    };
  }
}
