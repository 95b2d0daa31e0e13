/**
 * Analysis pipeline result shapes. Field names match the JSON artifacts.
 */

export type DatasetStatus = {
  source: string;
  status: 'loaded' | 'placeholder' | 'error';
  error?: string;
};

export type SimulationResult = {
  status: 'completed';
  disease: string;
  treatment: string | null;
  simulation_time: number;
};

export type AnalysisResult = {
  disease: string;
  timestamp: string;
  analysis_level: string;
  data_sources: string[];
  results: {
    pathways: string[];
    targets: string[];
    drugs: string[];
    datasets: DatasetStatus[];
  };
  simulation?: SimulationResult;
  validation_score?: number;
};

export interface AnalysisArtifacts {
  resultId: string;
  resultFile: string;
  summaryFile: string;
}

export interface AnalysisRun extends AnalysisArtifacts {
  result: AnalysisResult;
}

export interface AnalyzeOptions {
  dataSources?: string[];
  analysisLevel?: string;
}

export interface RunOptions extends AnalyzeOptions {
  simulate?: boolean;
  treatment?: string;
  validate?: boolean;
}

export interface StageEvent {
  stage: string;
  message: string;
  phase: 'start' | 'complete';
}
