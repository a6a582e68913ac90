export type SpamRisk = 'Low' | 'Medium' | 'High';

/** Raw entry as it arrives in a request; anything that isn't a string scores as empty. */
export type SubjectLineInput = string | null | undefined;

export interface ScoreReport {
  subject: string;
  score: number;
  length: number;
  spam_risk: SpamRisk;
  warnings: string[];
}

export interface BatchResult {
  results: ScoreReport[];
  best_subject: string;
}

export interface ToolParameter {
  name: string;
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description: string;
  required: boolean;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  parameters: ToolParameter[];
  endpoint: string;
  http_method: 'GET' | 'POST';
}

export interface DiscoveryDocument {
  functions: ToolDescriptor[];
}

export interface ErrorBody {
  error: {
    message: string;
    type?: string;
    stack?: string;
  };
}
