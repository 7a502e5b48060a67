export interface MediaAnalysisRequest {
  readonly prompt: string;
  readonly mediaUris: readonly string[];
  readonly signal?: AbortSignal;
}

export interface MediaAnalysisResult {
  readonly content: string;
  readonly sourceUrls: readonly string[];
}

export interface MediaAnalysisClient {
  analyze(request: MediaAnalysisRequest): Promise<MediaAnalysisResult>;
}
