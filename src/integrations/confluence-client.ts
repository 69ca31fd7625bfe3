import { ConfluenceClient } from 'confluence.js';
import { ProtocolError, TransientServiceError, errorForStatus, PipelineError } from '../utils/errors';
import { bodyAsText, isRecord } from '../utils/http-body';
import logger from '../utils/logger';
import { joinUrl } from './http-client';

export interface ConfluenceConnection {
  /** Site root including the `/wiki` context, without `/rest/api`. */
  baseUrl: string;
  username: string;
  apiToken: string;
  spaceKey: string;
}

export interface ConfluencePage {
  id: string;
  title: string;
  version: number;
}

export function createConfluenceClient(connection: ConfluenceConnection): ConfluenceClient {
  return new ConfluenceClient({
    host: connection.baseUrl,
    apiPrefix: '/rest/',
    authentication: {
      basic: {
        email: connection.username,
        apiToken: connection.apiToken,
      },
    },
  });
}

export function attachmentUploadUrl(baseUrl: string, pageId: string): string {
  return joinUrl(baseUrl, `rest/api/content/${encodeURIComponent(pageId)}/child/attachment?allowDuplicated=true`);
}

export function attachmentDownloadUrl(baseUrl: string, pageId: string, fileName: string): string {
  return joinUrl(baseUrl, `download/attachments/${encodeURIComponent(pageId)}/${encodeURIComponent(fileName)}`);
}

export function pageUrl(baseUrl: string, spaceKey: string, pageId: string): string {
  return joinUrl(baseUrl, `spaces/${encodeURIComponent(spaceKey)}/pages/${encodeURIComponent(pageId)}`);
}

function toPipelineError(error: unknown, context: string): PipelineError {
  // confluence.js surfaces axios errors; keep the status and body when present.
  if (isRecord(error) && isRecord(error.response) && typeof error.response.status === 'number') {
    return errorForStatus(error.response.status, bodyAsText(error.response.data), context);
  }
  return new TransientServiceError(`${context}: ${error instanceof Error ? error.message : String(error)}`);
}

export async function createPage(
  confluence: ConfluenceClient,
  spaceKey: string,
  title: string,
  storageBody: string
): Promise<ConfluencePage> {
  logger.info('Creating Confluence page', { space_key: spaceKey, title });

  try {
    const page = await confluence.content.createContent({
      type: 'page',
      title,
      space: { key: spaceKey },
      body: {
        storage: { value: storageBody, representation: 'storage' },
      },
    });

    if (!page.id) {
      throw new ProtocolError('Confluence returned a page without an id', JSON.stringify(page));
    }

    logger.info('Confluence page created', { page_id: page.id, title });
    return { id: page.id, title: page.title || title, version: page.version?.number ?? 1 };
  } catch (error) {
    if (error instanceof PipelineError) {
      throw error;
    }
    throw toPipelineError(error, 'Confluence page creation');
  }
}

export async function getPageVersion(confluence: ConfluenceClient, pageId: string): Promise<number> {
  try {
    const page = await confluence.content.getContentById({ id: pageId, expand: ['version'] });
    const version = page.version?.number;

    if (typeof version !== 'number') {
      throw new ProtocolError(`Confluence page ${pageId} has no version number`, JSON.stringify(page));
    }
    return version;
  } catch (error) {
    if (error instanceof PipelineError) {
      throw error;
    }
    throw toPipelineError(error, 'Confluence page version lookup');
  }
}

export async function updatePageBody(
  confluence: ConfluenceClient,
  page: { id: string; title: string },
  storageBody: string
): Promise<void> {
  const currentVersion = await getPageVersion(confluence, page.id);

  try {
    await confluence.content.updateContent({
      id: page.id,
      type: 'page',
      title: page.title,
      version: { number: currentVersion + 1 },
      body: {
        storage: { value: storageBody, representation: 'storage' },
      },
    });
  } catch (error) {
    throw toPipelineError(error, 'Confluence page update');
  }

  logger.info('Confluence page updated', { page_id: page.id, version: currentVersion + 1 });
}
