/**
 * Portal API client
 * One method per endpoint of the upload protocol; every call runs through Session.withAuth
 */

import { randomUUID } from 'node:crypto';
import type { Credential, StatusSnapshot } from '../types/index.js';
import { ConfigurationError, TransportError } from '../types/index.js';
import type { Session } from './session.js';
import { parseFileTypes, parseSignedUrls, parseStatusSnapshot } from '../utils/validation.js';
import { portalDayRange } from '../utils/date.js';
import { debug } from '../utils/logger.js';

/**
 * Path prefix shared by every upload endpoint
 */
export const API_PREFIX = '/mutual-api-rfds/api/v1/rips-api';

export const ENDPOINTS = {
  application: `${API_PREFIX}/application`,
  upload: `${API_PREFIX}/upload`,
  uploadFiles: `${API_PREFIX}/upload-files`,
  signedUrl: `${API_PREFIX}/signedUrl/getUrlUploadFile`,
  findLoad: `${API_PREFIX}/findLoad`,
} as const;

export interface PortalClientOptions {
  apiBaseUrl: string;
  /** Application code queried for upload configuration (e.g., "REG-FACT") */
  applicationCode: string;
  /** File type code to resolve (e.g., "ZIP_REG-FACT") */
  fileTypeCode: string;
  roles: string;
}

/**
 * Metadata reported after the bytes are transferred
 */
export interface RegisterFileRequest {
  /** In-attempt file name, e.g. "202503051030000000.zip" */
  uploadFileName: string;
  fileTypeId: string;
  /** Name of the local archive */
  fileName: string;
  sizeBytes: number;
}

/**
 * Converts bytes to megabytes rounded to two decimals
 */
export function toMegabytes(sizeBytes: number): number {
  return Math.round((sizeBytes / (1024 * 1024)) * 100) / 100;
}

export class PortalClient {
  constructor(
    private readonly session: Session,
    private readonly credential: Credential,
    private readonly options: PortalClientOptions
  ) {}

  private url(endpoint: string): string {
    return `${this.options.apiBaseUrl}${endpoint}`;
  }

  /**
   * Organization and user context the portal expects on API calls
   */
  contextHeaders(): Record<string, string> {
    return {
      'email': this.credential.username,
      'usuario': this.credential.username,
      'organizacion': this.credential.organizationId,
      'organizacionname': this.credential.organizationName,
      'user-id': this.credential.userId,
      'roles': this.options.roles,
      'transaction-id': this.session.transactionId,
    };
  }

  /**
   * Step 1: resolves the id of the configured file type
   * Merges the organization context into the session headers on success
   *
   * @throws ConfigurationError if the type code is missing or has no id
   */
  async resolveFileTypeId(): Promise<string> {
    const body = await this.session.withAuth(() =>
      this.session.send('GET', this.url(ENDPOINTS.application), {
        query: { codigo_aplicacion: this.options.applicationCode },
        headers: this.contextHeaders(),
      })
    );

    this.session.headers.merge(this.contextHeaders());

    const code = this.options.fileTypeCode;
    const match = parseFileTypes(body).find(tipo => tipo.code === code);
    if (!match) {
      throw new ConfigurationError(`Could not find a type with codigo '${code}' in the response`, code);
    }
    if (!match.id) {
      throw new ConfigurationError(`Type '${code}' found, but it has no 'id'`, code);
    }

    debug('Resolved file type', { module: 'portal-client', phase: 'config', code, fileTypeId: match.id });
    return match.id;
  }

  /**
   * Step 2: declares the upload so the portal allocates the load
   */
  async registerUploadIntent(fileTypeId: string, fileName: string): Promise<void> {
    await this.session.withAuth(() =>
      this.session.send('POST', this.url(ENDPOINTS.upload), {
        json: {
          id_cargue: this.session.transactionId,
          id_tipo: fileTypeId,
          organizacion: this.credential.organizationId,
          cantidad: 1,
          nombres: [fileName],
        },
      })
    );
  }

  /**
   * Step 3: requests a signed transfer URL for the in-attempt file name
   *
   * @throws TransportError if the response has no URL for that name
   */
  async getSignedUploadUrl(uploadFileName: string): Promise<string> {
    const url = this.url(ENDPOINTS.signedUrl);
    const body = await this.session.withAuth(() =>
      this.session.send('GET', url, { query: { fileNames: uploadFileName } })
    );

    const signedUrl = parseSignedUrls(body).get(uploadFileName);
    if (!signedUrl) {
      throw new TransportError(`No signed URL returned for ${uploadFileName}`, url, undefined, body);
    }
    return signedUrl;
  }

  /**
   * Step 4: PUTs the archive bytes to the signed URL
   *
   * Transfer headers are set on the session only for the duration of the
   * PUT and are always restored to JSON afterwards.
   */
  async transferFile(signedUrl: string, bytes: Buffer): Promise<void> {
    await this.session.withAuth(async () => {
      this.session.headers.merge({
        'Content-Type': 'application/zip',
        'Content-Length': String(bytes.length),
      });
      try {
        await this.session.send('PUT', signedUrl, { body: bytes });
      } finally {
        this.session.headers.set('Content-Type', 'application/json');
        this.session.headers.delete('Content-Length');
      }
    });
  }

  /**
   * Step 5: associates the transferred bytes with the load
   */
  async registerFile(request: RegisterFileRequest): Promise<void> {
    await this.session.withAuth(() =>
      this.session.send('POST', this.url(ENDPOINTS.uploadFiles), {
        json: [
          {
            codigo: request.uploadFileName,
            mensajes: [],
            id_archivo: randomUUID(),
            id_cargue: this.session.transactionId,
            extension: 'zip',
            tamano: toMegabytes(request.sizeBytes),
            id_tipo: request.fileTypeId,
            nombre: request.fileName,
          },
        ],
      })
    );
  }

  /**
   * Fetches the status of a load, filtered to the given calendar day
   *
   * @param correlationKey - Transaction id of the load
   * @param day - Any instant of the day to search
   */
  async findLoad(correlationKey: string, day: Date): Promise<StatusSnapshot> {
    const range = portalDayRange(day);
    const body = await this.session.withAuth(() =>
      this.session.send('POST', this.url(ENDPOINTS.findLoad), {
        json: {
          id: correlationKey,
          fecha_inicial: range.start,
          fecha_final: range.end,
          organizacion: this.credential.organizationId,
        },
      })
    );
    return parseStatusSnapshot(body);
  }
}
