export enum ProximityCurve {
  Linear = 'linear',
  Exponential = 'exponential',
}
