export enum SignalKind {
  Positive = 'positive',
  Negative = 'negative',
  Warning = 'warning',
}
