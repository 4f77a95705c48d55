export interface SessionManifestPage {
  status_code: number;
  final_url: string;
  content_type: string | null;
  content_hash_sha256: string;
  size_bytes: number;
  captured_at: string;
  body_path: string;
  headers_path: string;
}

export interface SessionManifestUrl {
  url: string;
  recorded_at: string;
}

export interface SessionManifestFile {
  filename: string;
  stored_path: string;
  content_hash_sha256: string;
  size_bytes: number;
  comments: string | null;
  recorded_at: string;
}

export interface SessionManifest {
  schema_version: "1.0";
  run_id: string;
  source_url: string;
  started_at: string;
  ended_at: string;
  page: SessionManifestPage | null;
  child_urls: SessionManifestUrl[];
  files: SessionManifestFile[];
}
