export interface PostgreSQLClient {
  testConnection(): Promise<boolean>;
}
