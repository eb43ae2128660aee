import { ServiceRunner } from '../../src/services';
import { IService } from '../../src/types';

describe('Service runner', () => {
  let runner: ServiceRunner;

  beforeEach(() => {
    jest.useFakeTimers();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    runner = new ServiceRunner();
  });

  afterEach(() => {
    runner.stop();
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it('should run a plain service immediately', () => {
    const service: IService = { execute: jest.fn() };
    runner.add(service);
    runner.run();
    expect(service.execute).toHaveBeenCalledTimes(1);
  });

  it('should run a delayed service once after the delay', () => {
    const service: IService = { execute: jest.fn(), delay: 1000 };
    runner.add(service);
    runner.run();
    expect(service.execute).not.toHaveBeenCalled();

    jest.advanceTimersByTime(1000);
    expect(service.execute).toHaveBeenCalledTimes(1);

    jest.advanceTimersByTime(5000);
    expect(service.execute).toHaveBeenCalledTimes(1);
  });

  it('should repeat an interval service until stopped', () => {
    const service: IService = { execute: jest.fn(), interval: 100 };
    runner.add(service);
    runner.run();
    expect(service.execute).toHaveBeenCalledTimes(1);

    jest.advanceTimersByTime(300);
    expect(service.execute).toHaveBeenCalledTimes(4);

    runner.stop();
    jest.advanceTimersByTime(300);
    expect(service.execute).toHaveBeenCalledTimes(4);
  });

  it('should keep running when a service throws', () => {
    const failing: IService = {
      execute: () => {
        throw new Error('boom');
      },
    };
    const next: IService = { execute: jest.fn() };
    runner.add(failing);
    runner.add(next);
    runner.run();
    expect(next.execute).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledWith(
      'Service stopped with error',
      expect.any(Error),
    );
  });
});
