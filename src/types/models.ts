export interface EndpointDescriptor {
  id: string;
  url: string;
  fileName: string;
  description: string;
}

export type EndpointResult =
  | {
      status: "ok";
      filePath: string;
      bytes: number;
      modifiedAt: Date;
    }
  | {
      status: "connection_error";
      message: string;
    }
  | {
      status: "http_status_error";
      statusCode: number;
      reason: string;
    }
  | {
      status: "malformed_payload";
      message: string;
    };

export type EndpointFailure = Exclude<EndpointResult, { status: "ok" }>;

export interface FileAvailability {
  id: string;
  fileName: string;
  filePath: string;
  available: boolean;
  bytes?: number;
}

export interface RunSummary {
  outcomes: Map<string, boolean>;
  results: Map<string, EndpointResult>;
  successes: number;
  failures: number;
  successRate: number;
  startedAt: Date;
  finishedAt: Date;
  availability: FileAvailability[];
}
