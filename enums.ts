export enum ScoringMode {
  NormalizedPercent = 'normalized_percent',
  LinearUnbounded = 'linear_unbounded',
}

export enum AngularDirection {
  Clockwise = 'clockwise',
  CounterClockwise = 'counterclockwise',
}

export enum SeriesKind {
  Profile = 'profile',
  Task = 'task',
}
