/**
 * DAVID web service adapter.
 *
 * Implements the EnrichmentService interface over DAVID's SOAP API. The SOAP
 * calls go through a small port so that tests can substitute an in-process
 * fake for the `soap` client.
 *
 * @packageDocumentation
 */

import * as soap from 'soap';
import type { Logger } from '../utils/logger.js';
import type {
  AnnotationCluster,
  ChartRecord,
  EnrichmentResult,
  EnrichmentService,
  ServiceFault,
  TermClusterReport,
} from './types.js';
import { createFault, createFaultResult, createReportResult } from './types.js';

/** Identifier type of submitted lists. */
export const ENTREZ_GENE_ID = 'ENTREZ_GENE_ID';

/** List type 0 is a gene list (1 would be a background). */
export const GENE_LIST_TYPE = 0;

/**
 * Term clustering parameters sent with every report request.
 */
export const CLUSTERING_PARAMETERS = {
  overlap: 3,
  initialSeed: 3,
  finalSeed: 3,
  linkage: 0.5,
  kappa: 50,
} as const;

/**
 * The three DAVID operations used by a scan. Results are returned as decoded
 * by the SOAP layer and validated by the adapter.
 */
export interface DavidSoapPort {
  authenticate(email: string): Promise<unknown>;
  addList(inputIds: string, idType: string, listName: string, listType: number): Promise<unknown>;
  getTermClusterReport(
    overlap: number,
    initialSeed: number,
    finalSeed: number,
    linkage: number,
    kappa: number
  ): Promise<unknown>;
}

/**
 * Connection settings for a DAVID port.
 */
export interface DavidConnectionOptions {
  readonly wsdlUrl: string;
  readonly endpoint: string;
  readonly timeoutMs: number;
}

/**
 * Creates a connected port.
 */
export type DavidPortFactory = (options: DavidConnectionOptions) => Promise<DavidSoapPort>;

/**
 * Error thrown when DAVID rejects the account email.
 */
export class DavidAuthenticationError extends Error {
  readonly code = 'DAVID_AUTHENTICATION_FAILED';
  public readonly email: string;

  constructor(message: string, email: string, cause?: Error) {
    super(message);
    this.name = 'DavidAuthenticationError';
    this.email = email;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Builds a `Cookie` header value from the `Set-Cookie` response headers.
 */
function sessionCookie(headers: unknown): string | null {
  if (!isRecord(headers)) {
    return null;
  }
  const raw = headers['set-cookie'];
  const values: unknown[] = Array.isArray(raw) ? raw : [raw];
  const pairs = values
    .filter((value): value is string => typeof value === 'string')
    .map((value) => value.split(';')[0]?.trim() ?? '')
    .filter((pair) => pair.length > 0);
  return pairs.length > 0 ? pairs.join('; ') : null;
}

async function invoke(
  client: soap.Client,
  operation: string,
  args: Record<string, unknown>,
  timeoutMs: number
): Promise<unknown> {
  const method: unknown = client[`${operation}Async`];
  if (typeof method !== 'function') {
    throw new Error(`DAVID service has no operation '${operation}'`);
  }
  const response: unknown = await method.call(client, args, { timeout: timeoutMs });
  // Async operations resolve to [result, rawResponse, soapHeader, rawRequest].
  return Array.isArray(response) ? response[0] : response;
}

/**
 * Port backed by the `soap` package.
 *
 * The session cookie set by `authenticate` is sent with every later call, and
 * every call carries the request timeout.
 */
export async function createSoapPort(options: DavidConnectionOptions): Promise<DavidSoapPort> {
  const client = await soap.createClientAsync(options.wsdlUrl, {
    endpoint: options.endpoint,
    wsdl_options: { timeout: options.timeoutMs },
  });
  client.setEndpoint(options.endpoint);
  const { timeoutMs } = options;

  // DAVID's operations take positional arguments named args0..argsN.
  return {
    async authenticate(email) {
      const result = await invoke(client, 'authenticate', { args0: email }, timeoutMs);
      const cookie = sessionCookie(client.lastResponseHeaders);
      if (cookie !== null) {
        client.addHttpHeader('Cookie', cookie);
      }
      return result;
    },
    addList(inputIds, idType, listName, listType) {
      return invoke(
        client,
        'addList',
        { args0: inputIds, args1: idType, args2: listName, args3: listType },
        timeoutMs
      );
    },
    getTermClusterReport(overlap, initialSeed, finalSeed, linkage, kappa) {
      return invoke(
        client,
        'getTermClusterReport',
        { args0: overlap, args1: initialSeed, args2: finalSeed, args3: linkage, args4: kappa },
        timeoutMs
      );
    },
  };
}

const TIMEOUT_CODES: ReadonlySet<string> = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);

/**
 * Maps a failed SOAP call to a fault.
 *
 * Timeouts become `timeout`, SOAP faults `service`, anything else `transport`.
 */
export function classifyError(error: unknown): ServiceFault {
  if (!(error instanceof Error)) {
    return createFault('transport', String(error));
  }

  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  if ((code !== undefined && TIMEOUT_CODES.has(code)) || /time(d)?\s?out/i.test(error.message)) {
    return createFault('timeout', error.message, error);
  }

  // The soap package attaches the decoded envelope to fault errors.
  if ('root' in error && isRecord(error.root)) {
    return createFault('service', error.message, error);
  }

  return createFault('transport', error.message, error);
}

/**
 * Decodes a numeric field, null when absent or not a finite number.
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return '';
}

/**
 * A SOAP array arrives as an array, as a single object, or not at all.
 */
function toList(value: unknown): unknown[] {
  if (Array.isArray(value)) {
    return value;
  }
  return value === null || value === undefined ? [] : [value];
}

function normalizeRecord(value: unknown): ChartRecord | null {
  if (!isRecord(value)) {
    return null;
  }
  return {
    categoryName: toText(value['categoryName']),
    termName: toText(value['termName']),
    listHits: toNumber(value['listHits']),
    percent: toNumber(value['percent']),
    ease: toNumber(value['ease']),
    geneIds: toText(value['geneIds']),
    listTotals: toNumber(value['listTotals']),
    popHits: toNumber(value['popHits']),
    popTotals: toNumber(value['popTotals']),
    foldEnrichment: toNumber(value['foldEnrichment']),
    bonferroni: toNumber(value['bonferroni']),
    benjamini: toNumber(value['benjamini']),
    afdr: toNumber(value['afdr']),
  };
}

function normalizeCluster(value: unknown): AnnotationCluster | null {
  if (!isRecord(value)) {
    return null;
  }
  const records = toList(value['simpleChartRecords'])
    .map(normalizeRecord)
    .filter((record): record is ChartRecord => record !== null);
  return { score: toNumber(value['score']), records };
}

function unwrapReturn(response: unknown): unknown {
  return isRecord(response) && 'return' in response ? response['return'] : response;
}

/**
 * Converts a decoded `getTermClusterReport` response into a report.
 *
 * Accepts the bare cluster list or the `{ return: [...] }` wrapper the SOAP
 * layer may leave around it.
 */
export function normalizeTermClusterReport(response: unknown): TermClusterReport {
  return toList(unwrapReturn(response))
    .map(normalizeCluster)
    .filter((cluster): cluster is AnnotationCluster => cluster !== null);
}

/**
 * EnrichmentService backed by DAVID.
 *
 * Obtain one through {@link connectDavidService}, which authenticates first.
 */
export class DavidEnrichmentService implements EnrichmentService {
  private readonly port: DavidSoapPort;

  constructor(port: DavidSoapPort) {
    this.port = port;
  }

  async submit(geneIds: readonly number[], listName: string): Promise<EnrichmentResult> {
    try {
      await this.port.addList(geneIds.join(','), ENTREZ_GENE_ID, listName, GENE_LIST_TYPE);
      const { overlap, initialSeed, finalSeed, linkage, kappa } = CLUSTERING_PARAMETERS;
      const response = await this.port.getTermClusterReport(
        overlap,
        initialSeed,
        finalSeed,
        linkage,
        kappa
      );
      return createReportResult(normalizeTermClusterReport(response));
    } catch (error) {
      return createFaultResult(classifyError(error));
    }
  }
}

/**
 * Options for connectDavidService.
 */
export interface ConnectDavidOptions extends DavidConnectionOptions {
  readonly email: string;
  readonly logger: Logger;
  /** Port factory (injectable for testing; default: the `soap` client). */
  readonly portFactory?: DavidPortFactory;
}

/**
 * Connects to DAVID and authenticates the account email.
 *
 * @throws {DavidAuthenticationError} If the connection or authentication fails.
 */
export async function connectDavidService(
  options: ConnectDavidOptions
): Promise<DavidEnrichmentService> {
  const factory = options.portFactory ?? createSoapPort;
  const { email, logger } = options;

  let port: DavidSoapPort;
  let response: unknown;
  try {
    port = await factory({
      wsdlUrl: options.wsdlUrl,
      endpoint: options.endpoint,
      timeoutMs: options.timeoutMs,
    });
    response = unwrapReturn(await port.authenticate(email));
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new DavidAuthenticationError(
      `Could not authenticate with DAVID: ${error instanceof Error ? error.message : String(error)}`,
      email,
      cause
    );
  }

  if (toText(response).trim().toLowerCase() !== 'true') {
    throw new DavidAuthenticationError(
      `DAVID rejected the email '${email}'; register it with DAVID web services first`,
      email
    );
  }

  logger.info('service_connected', { endpoint: options.endpoint });
  return new DavidEnrichmentService(port);
}
