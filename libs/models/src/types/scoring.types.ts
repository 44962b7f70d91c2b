import { SignalKind } from '@libs/common';

import { DataQualityReport } from './data-quality.types';

export interface ScoringSignal {
  kind: SignalKind;
  /** Stable machine label, also the key in scoreBreakdown */
  code: string;
  message: string;
  contribution: number;
}

export interface ScoringResult {
  score: number;
  isDisqualified: boolean;
  disqualificationReason: string | null;
  positiveSignals: ScoringSignal[];
  /** Negative signals and warnings */
  negativeSignals: ScoringSignal[];
  scoreBreakdown: Record<string, number>;
  dataQuality: DataQualityReport;
}
