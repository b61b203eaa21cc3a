/**
 * Enclave attestation quote producer
 * Reads the quote through the enclave's attestation pseudo-files
 */

import { promises as fs } from 'fs';
import path from 'path';
import { NOT_IN_ENCLAVE_SENTINEL } from '@keyshare-gate/auth';
import { logger } from '../logger';

const USER_REPORT_DATA_SIZE = 64;

export interface AttestationPaths {
  /** Directory holding user_report_data, attestation_type and quote */
  deviceRoot: string;
  /** Where the produced quote is persisted */
  quotePath: string;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Produce the enclave quote, or the sentinel bytes outside an enclave
 */
export async function generateQuote(paths: AttestationPaths): Promise<Buffer> {
  const userReportData = path.join(paths.deviceRoot, 'user_report_data');

  if (!(await exists(userReportData))) {
    logger.info(NOT_IN_ENCLAVE_SENTINEL);
    return Buffer.from(NOT_IN_ENCLAVE_SENTINEL);
  }

  logger.info('This is inside Enclave!');

  const attestationType = await fs.readFile(path.join(paths.deviceRoot, 'attestation_type'), 'utf8');
  logger.info({ attestationType: attestationType.trim() }, 'Attestation type');

  await fs.writeFile(userReportData, Buffer.alloc(USER_REPORT_DATA_SIZE));

  logger.info('Reading the quote');
  const quote = await fs.readFile(path.join(paths.deviceRoot, 'quote'));

  await fs.mkdir(path.dirname(paths.quotePath), { recursive: true });
  await fs.writeFile(paths.quotePath, quote);
  logger.info({ quotePath: paths.quotePath, size: quote.length }, 'Quote persisted');

  return quote;
}
