export interface ConnectionConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  sslMode?: string;
}

export interface ToolConfig {
  connection: ConnectionConfig;
  backupDir: string;
  binDir?: string;
  restoreDefaultFile?: string;
  logLevel: string;
}
