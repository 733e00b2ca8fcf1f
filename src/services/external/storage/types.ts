/**
 * A media object made available as a readable local file for the duration
 * of one invocation.
 */
export interface StagedMedia {
  path: string;
  cleanup(): Promise<void>;
}

export interface MediaStorage {
  readonly name: string;
  stage(bucketName: string, keyName: string): Promise<StagedMedia>;
}
