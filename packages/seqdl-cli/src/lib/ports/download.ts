/**
 * Abstraction for file download operations.
 * Allows testing without actual network requests.
 */
export interface DownloadService {
  /**
   * Download a file from URL to local path. Rejects with a FetchError;
   * the destination only appears once the whole body has been written.
   */
  download(
    url: string,
    outputPath: string,
    options?: DownloadRequestOptions
  ): Promise<DownloadReceipt>;
}

export interface DownloadRequestOptions {
  /** Aborting this signal cancels the transfer with a `canceled` FetchError */
  signal?: AbortSignal;
}

export interface DownloadReceipt {
  bytes: number;
}
