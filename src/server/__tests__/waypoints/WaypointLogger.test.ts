import {
  WaypointLogger,
  WaypointLogLevel,
  setGlobalWaypointLogLevel,
  getGlobalWaypointLogLevel,
} from '../../services/waypoints/WaypointLogger';

describe('WaypointLogger', () => {
  let originalLogLevel: WaypointLogLevel;

  beforeEach(() => {
    originalLogLevel = getGlobalWaypointLogLevel();
    setGlobalWaypointLogLevel(WaypointLogLevel.TRACE);
    jest.spyOn(console, 'log').mockImplementation();
    jest.spyOn(console, 'warn').mockImplementation();
    jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    setGlobalWaypointLogLevel(originalLogLevel);
    jest.restoreAllMocks();
  });

  describe('message formatting', () => {
    it('should format messages with context prefix', () => {
      const logger = new WaypointLogger('TestModule');
      logger.info('hello world');

      expect(console.log).toHaveBeenCalledWith('info TestModule: hello world');
    });

    it('should include map and scenario when provided', () => {
      const logger = new WaypointLogger('TestModule', { map: 'maze-32', scenario: 'even/maze-32-even-1.scen' });
      logger.info('test message');

      expect(console.log).toHaveBeenCalledWith(
        'info TestModule map=maze-32 scen=even/maze-32-even-1.scen: test message'
      );
    });

    it('should show a scenario under the map directory relative to it', () => {
      const logger = new WaypointLogger('TestModule', { map: 'maze-32', scenario: 'maze-32/maze-32-even-1.scen' });
      logger.info('test message');

      expect(console.log).toHaveBeenCalledWith('info TestModule map=maze-32 scen=maze-32-even-1.scen: test message');
    });

    it('should append JSON data when provided', () => {
      const logger = new WaypointLogger('TestModule');
      logger.info('agent fixed', { from: { x: -1, y: 3 }, to: { x: 0, y: 3 } });

      expect(console.log).toHaveBeenCalledWith(
        'info TestModule: agent fixed {"from":{"x":-1,"y":3},"to":{"x":0,"y":3}}'
      );
    });
  });

  describe('log levels', () => {
    it('should use correct level labels and console channels', () => {
      const logger = new WaypointLogger('Test');

      logger.trace('t');
      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(console.log).toHaveBeenCalledWith('trace Test: t');
      expect(console.log).toHaveBeenCalledWith('debug Test: d');
      expect(console.log).toHaveBeenCalledWith('info Test: i');
      expect(console.warn).toHaveBeenCalledWith('warn Test: w');
      expect(console.error).toHaveBeenCalledWith('error Test: e');
    });

    it('should suppress messages below the global log level', () => {
      setGlobalWaypointLogLevel(WaypointLogLevel.WARN);
      const logger = new WaypointLogger('Test');

      logger.trace('trace');
      logger.debug('debug');
      logger.info('info');
      logger.warn('warn');
      logger.error('error');

      expect(console.log).not.toHaveBeenCalled();
      expect(console.warn).toHaveBeenCalledTimes(1);
      expect(console.error).toHaveBeenCalledTimes(1);
    });
  });

  describe('scoped loggers', () => {
    it('should add the map with withMap and keep it with withScenario', () => {
      const scoped = new WaypointLogger('Builder').withMap('room-64').withScenario('room-64/a.scen');

      scoped.warn('fallback used');

      expect(console.warn).toHaveBeenCalledWith(
        'warn Builder map=room-64 scen=a.scen: fallback used'
      );
    });

    it('should drop the scenario when moving to another map', () => {
      const scoped = new WaypointLogger('Builder').withMap('room-64').withScenario('room-64/a.scen').withMap('den-101');

      scoped.info('next map');

      expect(console.log).toHaveBeenCalledWith('info Builder map=den-101: next map');
    });

    it('should not modify the original logger', () => {
      const base = new WaypointLogger('Builder');
      base.withMap('room-64');

      base.info('no context');

      expect(console.log).toHaveBeenCalledWith('info Builder: no context');
    });
  });
});
