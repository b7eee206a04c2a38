import 'reflect-metadata';
import { parseArgs, runCommand } from './index';
import { LA_SHANGHAI_QUERY } from './testing/fixtures';

describe('CLI', () => {
  describe('parseArgs', () => {
    it('should build a weather command from positional arguments', () => {
      const command = parseArgs(['weather', 'Los Angeles', 'Shanghai', '2026-11-02', 'Test Carrier', 'electronics']);

      expect(command).toEqual({ kind: 'weather', query: LA_SHANGHAI_QUERY });
    });

    it('should reject an unknown assessment kind', () => {
      expect(() => parseArgs(['political', 'Los Angeles', 'Shanghai', '2026-11-02', 'Test Carrier', 'electronics']))
        .toThrow('Unknown assessment kind: political');
    });

    it('should print usage when arguments are missing', () => {
      expect(() => parseArgs(['geopolitical', 'Los Angeles']))
        .toThrow('Usage: route-risk <geopolitical|weather>');
    });
  });

  describe('runCommand', () => {
    // Test: Kind selects the matching assessment
    it('should dispatch geopolitical commands to the geopolitical assessment', async () => {
      // Arrange
      const assessGeopoliticalRisk = jest.fn().mockResolvedValue({ kind: 'geopolitical' });
      const assessWeatherRisk = jest.fn();
      const service = { assessGeopoliticalRisk, assessWeatherRisk };

      // Act
      await runCommand(service, { kind: 'geopolitical', query: LA_SHANGHAI_QUERY });

      // Assert
      expect(assessGeopoliticalRisk).toHaveBeenCalledWith(LA_SHANGHAI_QUERY);
      expect(assessWeatherRisk).not.toHaveBeenCalled();
    });
  });
});
