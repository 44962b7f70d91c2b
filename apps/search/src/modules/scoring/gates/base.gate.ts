import { Coordinates, PoiDefinition, SearchConfig, SignalKind } from '@libs/common';
import { CandidateAttributes, DataQualityReport, Intent, ScoringSignal } from '@libs/models';

export interface GateContext {
  attributes: CandidateAttributes;
  intent: Intent;
  quality: DataQualityReport;
  targetCoords?: Coordinates;
  avoidCoords?: Coordinates;
}

export interface GateResult {
  signals: ScoringSignal[];
  /** Set only when the candidate fails a hard constraint */
  disqualificationReason?: string;
}

/**
 * One step of the scoring pipeline. A gate either contributes signals or
 * disqualifies the candidate; it never throws and never mutates its context.
 */
export abstract class BaseGate {
  public abstract readonly name: string;

  protected constructor(protected readonly config: SearchConfig) {}

  public abstract evaluate(context: GateContext): GateResult;

  protected pass(signals: ScoringSignal[] = []): GateResult {
    return { signals };
  }

  protected disqualify(reason: string, signals: ScoringSignal[] = []): GateResult {
    return { signals, disqualificationReason: reason };
  }

  protected positive(code: string, message: string, contribution: number): ScoringSignal {
    return { kind: SignalKind.Positive, code, message, contribution };
  }

  protected negative(code: string, message: string, contribution: number): ScoringSignal {
    return { kind: SignalKind.Negative, code, message, contribution };
  }

  protected warning(code: string, message: string): ScoringSignal {
    return { kind: SignalKind.Warning, code, message, contribution: 0 };
  }

  /** "School" or "School 'Satit Demonstration'" when the index knows the name */
  protected describePoi(attributes: CandidateAttributes, key: string, definition: PoiDefinition): string {
    const specificName = attributes.poiNames[key];

    return specificName && specificName !== definition.displayName
      ? `${definition.displayName} '${specificName}'`
      : definition.displayName;
  }

  protected formatMeters(distance: number): string {
    return `${Math.round(distance)} m`;
  }

  protected formatKm(distance: number): string {
    return `${(distance / 1000).toFixed(1)} km`;
  }

  protected formatAmount(amount: number): string {
    return Math.round(amount)
      .toString()
      .replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  }
}
