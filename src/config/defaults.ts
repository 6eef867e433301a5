/**
 * Default configuration values.
 *
 * @packageDocumentation
 */

import type { Config, LoggingConfig, OutputConfig, ScanConfig, ServiceConfig } from './types.js';

/** Public DAVID web service WSDL. */
export const DEFAULT_WSDL_URL =
  'https://davidbioinformatics.nih.gov/webservice/services/DAVIDWebService?wsdl';

/** Public DAVID SOAP 1.1 endpoint. */
export const DEFAULT_ENDPOINT =
  'https://davidbioinformatics.nih.gov/webservice/services/DAVIDWebService.DAVIDWebServiceHttpSoap11Endpoint/';

export const DEFAULT_SCAN: ScanConfig = {
  window_size: 100,
  step_size: 25,
  max_clusters: 3,
  pval_threshold: 0.01,
};

/**
 * The empty email is intentional: it has to come from the user and is
 * rejected by validation.
 */
export const DEFAULT_SERVICE: ServiceConfig = {
  email: '',
  wsdl_url: DEFAULT_WSDL_URL,
  endpoint: DEFAULT_ENDPOINT,
  timeout_seconds: 60,
  retries: 3,
  wait_seconds: 10,
};

export const DEFAULT_OUTPUT: OutputConfig = {
  outdir: 'results',
  species: 'NA',
  charts: true,
};

export const DEFAULT_LOGGING: LoggingConfig = {
  level: 'info',
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  scan: DEFAULT_SCAN,
  service: DEFAULT_SERVICE,
  output: DEFAULT_OUTPUT,
  logging: DEFAULT_LOGGING,
};

/** Config file looked up in the working directory when none is given. */
export const DEFAULT_CONFIG_FILE = 'window-enrich.toml';
