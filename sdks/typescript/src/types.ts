export interface ScanHit {
  found: true;
  data: string;
  type: string;
}

export interface ScanMiss {
  found: false;
}

export type ScanResult = ScanHit | ScanMiss;

export interface ScanRequest {
  image: string;
}

export interface HealthResponse {
  status: 'ok';
}

export type SessionState = 'idle' | 'scanning';
