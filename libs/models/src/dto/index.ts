export * from './intent.dto';
export * from './location.dto';
export * from './search-request.dto';
export * from './scoring-result.dto';
export * from './ranking.dto';
