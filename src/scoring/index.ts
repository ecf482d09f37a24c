export { aggregateDeckScore, scoreBand, scoreBandLabel, ScoreBand, STATUS_BASE_SCORES } from './deck-score';
