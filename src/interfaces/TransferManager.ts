import { BackupObject } from './BackupCatalog';

/** Called once per received chunk */
export type ProgressCallback = (bytesTransferred: number, chunkSize: number) => void;

export interface DownloadResult {
  /** Database named by the resolved token */
  database: string;

  key: string;

  /** Absolute path of the downloaded file */
  filePath: string;

  /** Bytes written */
  size: number;
}

export interface TransferManager {
  /** Stream a remote backup into the download directory */
  download(object: BackupObject, database: string): Promise<DownloadResult>;
}
