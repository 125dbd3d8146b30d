export type BackupMode = 'schema-only' | 'full';

export interface BackupArtifact {
  mode: BackupMode;
  filePath: string;
  fileSize: number;
  timestamp: Date;
}
