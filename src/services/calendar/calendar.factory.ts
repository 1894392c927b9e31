import { GoogleCalendarAdapter } from './google.adapter';
import { InMemoryCalendarAdapter } from './memory.adapter';
import { CalendarProvider } from '../../types/calendar';

export interface CalendarProviderConfig {
  googleCredentials?: string;
}

export class CalendarProviderFactory {
  static create(provider: string, config: CalendarProviderConfig = {}): CalendarProvider {
    switch (provider) {
      case 'google':
        return new GoogleCalendarAdapter(config.googleCredentials);
      case 'memory':
        return new InMemoryCalendarAdapter();
      case 'outlook':
        throw new Error(`Calendar provider not implemented: ${provider}`);
      default:
        throw new Error(`Unsupported calendar provider: ${provider}`);
    }
  }
}
