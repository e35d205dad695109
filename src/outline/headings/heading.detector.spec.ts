import { HeadingDetector } from './heading.detector';
import { NumberedHeadingStrategy } from './numbered-heading.strategy';
import { AllCapsHeadingStrategy } from './all-caps-heading.strategy';
import { MixedCapHeadingStrategy } from './mixed-cap-heading.strategy';

describe('heading strategies', () => {
  describe('NumberedHeadingStrategy', () => {
    const strategy = new NumberedHeadingStrategy();

    it('scores deeper numbering higher', () => {
      expect(strategy.getConfidence('1 Scope')).toBeCloseTo(0.6);
      expect(strategy.getConfidence('4.2 Message Format')).toBeCloseTo(0.8);
      expect(strategy.getConfidence('4.2.1 Field Order')).toBeCloseTo(1.0);
    });

    it('caps confidence at 1', () => {
      expect(strategy.getConfidence('1.2.3.4.5 Deep Heading')).toBe(1);
    });

    it('rejects lines without a numeric prefix', () => {
      expect(strategy.getConfidence('Scope')).toBe(0);
      expect(strategy.getConfidence('12')).toBe(0);
    });
  });

  describe('AllCapsHeadingStrategy', () => {
    const strategy = new AllCapsHeadingStrategy();

    it('matches upper-case headings', () => {
      expect(strategy.getConfidence('REQUIREMENTS')).toBe(1);
      expect(strategy.getConfidence('SECTION 3 (OVERVIEW)')).toBe(1);
    });

    it('rejects short or mixed-case lines', () => {
      expect(strategy.getConfidence('ABC')).toBe(0);
      expect(strategy.getConfidence('A123')).toBe(0);
      expect(strategy.getConfidence('Requirements')).toBe(0);
    });
  });

  describe('MixedCapHeadingStrategy', () => {
    const strategy = new MixedCapHeadingStrategy();

    it('scores the share of capitalized words', () => {
      expect(strategy.getConfidence('Message Format Rules')).toBe(1);
      expect(strategy.getConfidence('Message format')).toBe(0.5);
    });

    it('needs at least two words and half of them capitalized', () => {
      expect(strategy.getConfidence('Overview')).toBe(0);
      expect(strategy.getConfidence('the Message format')).toBe(0);
    });
  });
});

describe('HeadingDetector', () => {
  let detector: HeadingDetector;

  beforeEach(() => {
    detector = new HeadingDetector();
  });

  it('registers the default strategies in order', () => {
    expect(detector.getStrategies().map((s) => s.name)).toEqual([
      'numbered',
      'all-caps',
      'mixed-cap',
    ]);
  });

  it('detects an all-caps heading with full confidence', () => {
    expect(detector.detectBest('REQUIREMENTS')).toEqual({
      heading: 'REQUIREMENTS',
      strategy: 'all-caps',
      confidence: 1,
    });
  });

  it('breaks ties by registration order', () => {
    // all-caps and mixed-cap both score 1
    expect(detector.detectBest('3 POWER RULES')?.strategy).toBe('all-caps');
  });

  it('returns the trimmed line as the heading', () => {
    expect(detector.detectHeading('   Message Format  ')).toBe('Message Format');
  });

  it('returns null when nothing matches', () => {
    expect(detector.detectHeading('just some lowercase words')).toBeNull();
    expect(detector.detectHeading('   ')).toBeNull();
  });

  it('uses injected strategies instead of the defaults', () => {
    const custom = new HeadingDetector([new MixedCapHeadingStrategy()]);

    expect(custom.detectHeading('REQUIREMENTS')).toBeNull();

    custom.addStrategy(new AllCapsHeadingStrategy());
    expect(custom.detectHeading('REQUIREMENTS')).toBe('REQUIREMENTS');
  });

  it('tracks and resets per-strategy counters', () => {
    detector.detectBest('REQUIREMENTS');

    expect(detector.getStrategyStats()).toEqual({
      numbered: { matchesFound: 0, totalChecks: 1 },
      'all-caps': { matchesFound: 1, totalChecks: 1 },
      'mixed-cap': { matchesFound: 0, totalChecks: 1 },
    });

    detector.resetStats();
    expect(detector.getStrategyStats()['all-caps']).toEqual({
      matchesFound: 0,
      totalChecks: 0,
    });
  });
});
