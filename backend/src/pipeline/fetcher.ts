import path from 'node:path';
import { createWriteStream, promises as fsp } from 'node:fs';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import axios, { type AxiosInstance } from 'axios';
import extract from 'extract-zip';
import { z } from 'zod';
import type { KaggleSettings } from '../config.js';
import { FetchError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { readDirectoryRecursive } from '../utils/fs.js';

export type DatasetCredential = {
  username: string;
  key: string;
};

export type FetchRequest = {
  datasetId: string;
  directory: string;
  credential: DatasetCredential;
  /** File the caller needs from the archive. */
  sourceFile: string;
};

export type FetchResult = {
  sourcePath: string;
  files: string[];
};

export interface DatasetFetcher {
  fetch(request: FetchRequest): Promise<FetchResult>;
}

const DATASET_ID = /^([A-Za-z0-9][\w.-]*)\/([A-Za-z0-9][\w.-]*)$/;

const credentialFileSchema = z.object({
  username: z.string().min(1),
  key: z.string().min(1),
});

export function parseDatasetId(datasetId: string): { owner: string; slug: string } {
  const match = DATASET_ID.exec(datasetId.trim());
  if (!match) {
    throw new FetchError(`invalid dataset identifier "${datasetId}", expected owner/dataset`);
  }
  return { owner: match[1], slug: match[2] };
}

/**
 * `KAGGLE_USERNAME`/`KAGGLE_KEY` when both are set, otherwise `kaggle.json`
 * in the Kaggle config directory.
 */
export async function resolveKaggleCredential(settings: KaggleSettings): Promise<DatasetCredential> {
  if (settings.username && settings.key) {
    return { username: settings.username, key: settings.key };
  }

  const file = path.join(settings.configDir, 'kaggle.json');
  let contents: string;
  try {
    contents = await fsp.readFile(file, 'utf8');
  } catch (error) {
    throw new FetchError(`no dataset credential: set KAGGLE_USERNAME and KAGGLE_KEY or provide ${file}`, {
      cause: error,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(contents);
  } catch (error) {
    throw new FetchError(`${file} is not valid JSON`, { cause: error });
  }

  const parsed = credentialFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new FetchError(`${file} must contain a username and a key`, { details: parsed.error.flatten() });
  }
  return parsed.data;
}

function toFetchError(error: unknown, datasetId: string): FetchError {
  if (axios.isAxiosError(error)) {
    const body: unknown = error.response?.data;
    if (body instanceof Readable) {
      body.destroy();
    }
    const status = error.response?.status;
    if (status === 401 || status === 403) {
      return new FetchError(`dataset provider rejected the credential (HTTP ${status})`, { cause: error });
    }
    if (status === 404) {
      return new FetchError(`dataset ${datasetId} not found`, { cause: error });
    }
    if (status) {
      return new FetchError(`dataset provider responded with HTTP ${status}`, { cause: error });
    }
    return new FetchError(`network error while downloading ${datasetId}: ${error.message}`, { cause: error });
  }
  return new FetchError(`download of ${datasetId} failed: ${errorMessage(error)}`, { cause: error });
}

/**
 * Downloads a Kaggle dataset archive and expands it in place.
 */
export class KaggleFetcher implements DatasetFetcher {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(http: AxiosInstance, logger: Logger) {
    this.http = http;
    this.logger = logger;
  }

  async fetch(request: FetchRequest): Promise<FetchResult> {
    const { owner, slug } = parseDatasetId(request.datasetId);
    const directory = path.resolve(request.directory);
    const archivePath = path.join(directory, `${slug}.zip`);
    // Emptied before each extraction so only this archive's files are searched.
    const target = path.join(directory, slug);

    try {
      await fsp.mkdir(directory, { recursive: true });
    } catch (error) {
      throw new FetchError(`cannot create download directory ${directory}`, { cause: error });
    }

    this.logger.info({ datasetId: request.datasetId, directory }, 'downloading dataset archive');
    try {
      const response = await this.http.get<Readable>(`/datasets/download/${owner}/${slug}`, {
        auth: { username: request.credential.username, password: request.credential.key },
        responseType: 'stream',
      });
      await pipeline(response.data, createWriteStream(archivePath));
    } catch (error) {
      await fsp.rm(archivePath, { force: true });
      throw toFetchError(error, request.datasetId);
    }

    try {
      await fsp.rm(target, { recursive: true, force: true });
      await extract(archivePath, { dir: target });
    } catch (error) {
      throw new FetchError(`archive for ${request.datasetId} could not be extracted`, { cause: error });
    } finally {
      await fsp.rm(archivePath, { force: true });
    }

    const files = await readDirectoryRecursive(target);
    const wanted = request.sourceFile.toUpperCase();
    const sourcePath = files.find((file) => path.basename(file).toUpperCase() === wanted);
    if (!sourcePath) {
      throw new FetchError(`archive for ${request.datasetId} does not contain ${request.sourceFile}`, {
        details: { files: files.map((file) => path.relative(target, file)) },
      });
    }

    this.logger.info({ sourcePath, files: files.length }, 'dataset downloaded');
    return { sourcePath, files };
  }
}
