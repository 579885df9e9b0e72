import vader from 'vader-sentiment';
import { VaderSentimentAnalyzer } from '../../../services/sentiment/SentimentAnalyzer';

jest.mock('vader-sentiment', () => ({
  SentimentIntensityAnalyzer: {
    polarity_scores: jest.fn()
  }
}));

describe('VaderSentimentAnalyzer', () => {
  const polarityScores = jest.mocked(vader.SentimentIntensityAnalyzer.polarity_scores);
  let analyzer: VaderSentimentAnalyzer;

  beforeEach(() => {
    jest.clearAllMocks();
    analyzer = new VaderSentimentAnalyzer();
  });

  it('returns the compound polarity of the text', () => {
    polarityScores.mockReturnValue({ neg: 0, neu: 0.4, pos: 0.6, compound: 0.42 });

    expect(analyzer.score('a lovely little game')).toBe(0.42);
    expect(polarityScores).toHaveBeenCalledWith('a lovely little game');
  });

  it('clamps the compound score to [-1, 1]', () => {
    polarityScores.mockReturnValue({ neg: 0, neu: 0, pos: 1, compound: 1.7 });
    expect(analyzer.score('best ever')).toBe(1);

    polarityScores.mockReturnValue({ neg: 1, neu: 0, pos: 0, compound: -3 });
    expect(analyzer.score('worst ever')).toBe(-1);
  });

  it('scores blank text as neutral without consulting the lexicon', () => {
    expect(analyzer.score('   ')).toBe(0);
    expect(polarityScores).not.toHaveBeenCalled();
  });

  it('treats a non-numeric compound as neutral', () => {
    polarityScores.mockReturnValue({ neg: 0, neu: 1, pos: 0, compound: Number.NaN });

    expect(analyzer.score('???')).toBe(0);
  });
});
