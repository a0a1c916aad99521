/**
 * Economics lexicon used by the lexicon classifier to assign the topic label.
 * Terms are matched against lowercased headlines; multi-word terms match as phrases.
 */
export const ECONOMICS_TERMS = [
  // Macro
  'economy',
  'economic',
  'economist',
  'recession',
  'inflation',
  'deflation',
  'gdp',
  'unemployment',
  'jobless',
  'payrolls',
  'wages',
  'interest rate',
  'federal reserve',
  'the fed',
  'central bank',
  'treasury',
  'budget deficit',
  'national debt',
  'tariff',
  'trade deficit',

  // Markets
  'stocks',
  'stock market',
  'wall street',
  'dow',
  'nasdaq',
  'bond',
  'dollar',
  'oil prices',
  'housing market',
  'mortgage',

  // Business
  'earnings',
  'profit',
  'bankruptcy',
  'layoffs',
  'merger',
  'consumer spending',
  'retail sales',
] as const;

export const ECONOMICS_TOPIC = 'Economics';
export const OTHER_TOPIC = 'Other';
