/**
 * Application metadata from the metadata service
 */
/* eslint-disable @typescript-eslint/naming-convention */
import { z } from 'zod';

import { toError } from '@utils/errors';
import { postJson } from '@utils/http';
import { logger } from '@utils/logger';
import { type ApplicationMetadata } from '@/types/specification';

const field = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .optional()
  .transform((value) => (value === undefined || value === null ? '' : String(value)));

const MetadataResponseSchema = z.object({
  'Application Name': z.string(),
  'Application Type': field,
  'Central ID': field,
  'Company Platform': field,
  'Tech Platform': field,
  'Target Production Environment': field,
  'Hosting Environment': field,
  'Internet Facing': field,
  'Data Classification': field,
});

export type MetadataResponse = z.infer<typeof MetadataResponseSchema>;

/**
 * Remap the service's flat response to the document's grouped layout
 */
export const remapMetadata = (response: MetadataResponse): ApplicationMetadata => ({
  Information: {
    Name: response['Application Name'],
    Type: response['Application Type'],
    'Central ID': response['Central ID'],
    'Company Platform': response['Company Platform'],
    'Tech Platform': response['Tech Platform'],
  },
  Architecture: {
    'Target Production Environment': response['Target Production Environment'],
    'Hosting Environment': response['Hosting Environment'],
    'Internet Facing': response['Internet Facing'] === 'None' ? 'No' : 'Yes',
  },
  Risk: {
    'Data Classification': response['Data Classification'],
  },
  Regulatory: {
    'Sensitive Data Elements (SDE) / Personally Identifiable Information (PII)':
      response['Data Classification'] === 'None' ? 'No' : 'Yes',
  },
});

export interface MetadataSource {
  fetch(codebase: string): Promise<ApplicationMetadata | null>;
}

/**
 * Client for the `/fetch-metadata` endpoint
 */
export class MetadataClient implements MetadataSource {
  constructor(
    private readonly url: string,
    private readonly timeoutMs: number
  ) {}

  /**
   * @returns Remapped metadata, or null on any failure
   */
  async fetch(codebase: string): Promise<ApplicationMetadata | null> {
    try {
      const response = await postJson(this.url, { codebase }, this.timeoutMs, 'metadata service');
      if (response.status !== 200) {
        logger.warn(`Metadata service returned HTTP ${String(response.status)}`, {
          codebase,
          body: response.text.slice(0, 200),
        });
        return null;
      }

      const parsed = MetadataResponseSchema.safeParse(response.body);
      if (!parsed.success) {
        logger.warn('Metadata service returned a malformed body', { codebase, issues: parsed.error.issues.length });
        return null;
      }

      return remapMetadata(parsed.data);
    } catch (error) {
      logger.warn('Metadata fetch failed', { codebase, error: toError(error).message });
      return null;
    }
  }
}
