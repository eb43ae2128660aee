import { IService } from '../types';

const runSafely = (service: IService, message: string) => {
  try {
    Promise.resolve(service.execute()).catch((e: unknown) => {
      console.log(message, e);
    });
  } catch (e: unknown) {
    console.log(message, e);
  }
};

export class ServiceRunner {
  services: IService[] = [];
  timers: NodeJS.Timeout[] = [];
  add(service: IService) {
    this.services.push(service);
  }
  run() {
    this.services.map((service: IService) => {
      if (service.interval || service.delay) {
        const interval = setInterval(() => {
          runSafely(service, 'Service error');
          if (service.delay && !service.interval) {
            clearInterval(interval);
          }
        }, service.interval || service.delay);
        this.timers.push(interval);
        if (!service.delay) {
          runSafely(service, 'Service error');
        }
      } else {
        runSafely(service, 'Service stopped with error');
      }
    });
  }
  stop() {
    this.timers.forEach(timer => clearInterval(timer));
    this.timers = [];
  }
}

export const serviceRunner = new ServiceRunner();
