import path from "path";

export const DATA_ROOT = process.env.DATA_ROOT || path.join(process.cwd(), "data");

export const SCHEMA_DIR = process.env.SCHEMA_DIR || path.join(process.cwd(), "schemas");

export interface DataPaths {
  root: string;
  uploads: string;
  staging: string;
  processed: string;
  records: string;
  audit: string;
}

/** Working directories under one data root */
export function dataPaths(root: string = DATA_ROOT): DataPaths {
  return {
    root,
    uploads: path.join(root, "uploads"),
    staging: path.join(root, "staging"),
    processed: path.join(root, "staging", "processed"),
    records: path.join(root, "records"),
    audit: path.join(root, "audit"),
  };
}

export function uploadLogFile(paths: DataPaths): string {
  return path.join(paths.audit, "uploads.json");
}

export function changeLogFile(paths: DataPaths): string {
  return path.join(paths.audit, "changes.json");
}

export function importAuditFile(paths: DataPaths): string {
  return path.join(paths.audit, "import_audit.log");
}
