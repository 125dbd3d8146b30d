export interface EnvironmentConfig {
  // Required
  DB_USER: string;

  // Required unless SUPABASE_URL is set
  DB_HOST?: string;
  SUPABASE_URL?: string;

  // Optional
  DB_PORT?: string;
  DB_NAME?: string;
  DB_SSLMODE?: string;
  PASS?: string;
  DB_PASSWORD?: string;
  BACKUP_DIR?: string;
  PG_BIN_DIR?: string;
  RESTORE_DEFAULT_FILE?: string;
  LOG_LEVEL?: string;
}
