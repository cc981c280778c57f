// ============================================================================
// Salesforce REST Client — Authenticated requests with error classification
// ============================================================================

import type { CrmConfig } from './config.js';
import { ApiErrorBodySchema } from './types/index.js';
import { CrmApiError, CrmAuthError, CrmRateLimitError } from './errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface SalesforceClient {
  /**
   * Sends a request relative to /services/data/{version}, or to an absolute
   * /services/data/... path (as returned in nextRecordsUrl).
   * Resolves with the parsed JSON body, or null for 204 No Content.
   */
  request(method: HttpMethod, path: string, body?: unknown): Promise<unknown>;
}

/**
 * Creates a client bound to one org and session token.
 *
 * Classifies HTTP errors into typed error classes. NEVER includes record
 * field values in error messages; the raw body is kept on the error.
 */
export function createSalesforceClient(
  config: Pick<CrmConfig, 'instanceUrl' | 'accessToken' | 'apiVersion'>,
): SalesforceClient {
  const basePath = `/services/data/${config.apiVersion}`;

  return {
    async request(method, path, body) {
      const fullPath = path.startsWith('/services/data/') ? path : `${basePath}${path}`;
      const response = await sfFetch(`${config.instanceUrl}${fullPath}`, {
        method,
        headers: {
          Authorization: `Bearer ${config.accessToken}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        ...(body === undefined ? {} : { body: JSON.stringify(body) }),
      });

      if (response.status === 204) {
        return null;
      }
      const data: unknown = await response.json();
      return data;
    },
  };
}

async function sfFetch(url: string, init: RequestInit): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, init);
  } catch (error) {
    // Network failures, DNS, aborted connections
    throw new CrmApiError(
      `CRM API request failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      0,
      '',
    );
  }

  if (!response.ok) {
    const responseBody = await response.text();

    if (response.status === 401) {
      throw new CrmAuthError(responseBody);
    }
    if (response.status === 429 || (response.status === 403 && hasErrorCode(responseBody, 'REQUEST_LIMIT_EXCEEDED'))) {
      throw new CrmRateLimitError(response.status, responseBody);
    }

    throw new CrmApiError(
      `CRM API error: ${response.status} ${response.statusText}${errorCodeSuffix(responseBody)}`,
      response.status,
      responseBody,
    );
  }

  return response;
}

function parseErrorBody(responseBody: string) {
  try {
    const parsed = ApiErrorBodySchema.safeParse(JSON.parse(responseBody));
    return parsed.success ? parsed.data : [];
  } catch {
    // Not JSON (HTML error page from a proxy); the raw body stays on the error
    return [];
  }
}

function hasErrorCode(responseBody: string, code: string): boolean {
  return parseErrorBody(responseBody).some((entry) => entry.errorCode === code);
}

function errorCodeSuffix(responseBody: string): string {
  const codes = parseErrorBody(responseBody).map((entry) => entry.errorCode);
  return codes.length > 0 ? ` [${codes.join(', ')}]` : '';
}
