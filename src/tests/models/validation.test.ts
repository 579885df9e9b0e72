import {
  validateInteractionRecord,
  validateCatalogEntry,
  validateRecommendationResponse,
  validateQuery,
  createRecommendationQuerySchema,
  gamesQuerySchema,
  historyQuerySchema,
  ValidationError
} from '../../models/validation';

describe('Validation', () => {
  describe('validateInteractionRecord', () => {
    it('maps a valid record to the model shape', () => {
      const { value, error } = validateInteractionRecord({
        user_id: 'u1',
        item_name: 'Alpha',
        playtime: 120,
        recommend: true,
        review: 'solid'
      });

      expect(error).toBeUndefined();
      expect(value).toEqual({ userId: 'u1', itemName: 'Alpha', playtime: 120, recommend: true, review: 'solid' });
    });

    it('reads playtime_forever as playtime', () => {
      const { value } = validateInteractionRecord({ user_id: 'u1', item_name: 'Alpha', playtime_forever: 75 });

      expect(value?.playtime).toBe(75);
    });

    it('defaults missing playtime to zero and drops null flags', () => {
      const { value } = validateInteractionRecord({
        user_id: 'u1',
        item_name: 'Alpha',
        recommend: null,
        review: null
      });

      expect(value).toEqual({ userId: 'u1', itemName: 'Alpha', playtime: 0 });
    });

    it('strips fields it does not know', () => {
      const { value } = validateInteractionRecord({ user_id: 'u1', item_name: 'Alpha', playtime: 1, item_id: '42' });

      expect(value).toEqual({ userId: 'u1', itemName: 'Alpha', playtime: 1 });
    });

    it('rejects records without a user or a game', () => {
      expect(validateInteractionRecord({ item_name: 'Alpha', playtime: 1 }).error).toBeDefined();
      expect(validateInteractionRecord({ user_id: 'u1', playtime: 1 }).error).toBeDefined();
    });

    it('rejects negative playtime', () => {
      const { value, error } = validateInteractionRecord({ user_id: 'u1', item_name: 'Alpha', playtime: -5 });

      expect(value).toBeUndefined();
      expect(error?.details[0].path).toEqual(['playtime']);
    });

    it('rejects values that are not objects', () => {
      expect(validateInteractionRecord('u1,Alpha,10').error).toBeDefined();
      expect(validateInteractionRecord(null).error).toBeDefined();
    });
  });

  describe('validateCatalogEntry', () => {
    it('accepts genre as an alias for categories', () => {
      expect(validateCatalogEntry({ item_name: 'Beta', genre: ['Action', 'RPG'] }).value).toEqual({
        itemName: 'Beta',
        categories: ['Action', 'RPG']
      });
    });

    it('normalizes labels and removes placeholders', () => {
      const { value } = validateCatalogEntry({ item_name: 'Beta', categories: [' Action', 'Action', 'Unknown', ''] });

      expect(value?.categories).toEqual(['Action']);
    });

    it('treats a missing genre list as no genres', () => {
      expect(validateCatalogEntry({ item_name: 'Beta' }).value).toEqual({ itemName: 'Beta', categories: [] });
    });

    it('rejects entries without a name', () => {
      expect(validateCatalogEntry({ categories: ['Action'] }).error).toBeDefined();
    });
  });

  describe('validateQuery', () => {
    const recommendationQuerySchema = createRecommendationQuerySchema({ topK: 10, boostFactor: 1.5 });

    it('fills in default topK and boost', () => {
      expect(validateQuery(recommendationQuerySchema, { game: 'Alpha' })).toEqual({
        game: 'Alpha',
        topK: 10,
        boost: 1.5
      });
    });

    it('converts query string values', () => {
      expect(validateQuery(recommendationQuerySchema, { game: 'Alpha', topK: '3', boost: '2' })).toEqual({
        game: 'Alpha',
        topK: 3,
        boost: 2
      });
    });

    it('throws a ValidationError listing every problem', () => {
      let caught: unknown;
      try {
        validateQuery(recommendationQuerySchema, { topK: '101', boost: '0' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      if (caught instanceof ValidationError) {
        expect(caught.details.map(detail => detail.path[0])).toEqual(['game', 'topK', 'boost']);
      }
    });

    it('keeps the game name exactly as given', () => {
      expect(validateQuery(recommendationQuerySchema, { game: ' Alpha ' }).game).toBe(' Alpha ');
    });

    it('accepts a topK of zero', () => {
      expect(validateQuery(recommendationQuerySchema, { game: 'Alpha', topK: '0' }).topK).toBe(0);
    });

    it('bounds the games and history limits', () => {
      expect(validateQuery(gamesQuerySchema, {})).toEqual({ limit: 50 });
      expect(validateQuery(historyQuerySchema, {})).toEqual({ limit: 10 });
      expect(() => validateQuery(historyQuerySchema, { limit: '0' })).toThrow(ValidationError);
      expect(() => validateQuery(gamesQuerySchema, { limit: '501' })).toThrow(ValidationError);
    });
  });

  describe('validateRecommendationResponse', () => {
    it('accepts a well-formed response', () => {
      const response = {
        likedItem: 'Alpha',
        rankedItems: ['Beta'],
        scores: { Beta: 3.4 },
        categories: { Beta: ['Action', 'RPG'] },
        support: { Beta: 2 },
        cached: false
      };

      expect(validateRecommendationResponse(response).value).toEqual(response);
    });

    it('rejects a response missing fields', () => {
      const { value, error } = validateRecommendationResponse({ likedItem: 'Alpha', rankedItems: [] });

      expect(error).toBeDefined();
      expect(value).toBeUndefined();
    });
  });
});
