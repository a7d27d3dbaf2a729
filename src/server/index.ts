import { createScheduleRegistry } from '../adapters/calendar';
import { env } from '../config/env';
import { getOfficeDirectory, OFFICES_PATH } from '../config/offices';
import { logEvent } from '../utils/log';
import { createApp } from './app';

const directory = getOfficeDirectory();
const registry = createScheduleRegistry(directory.offices);

for (const store of registry.list()) {
  logEvent('schedule.initialized', {
    officeId: store.config.id,
    bookable: store.config.bookable,
    from: store.today,
    days: store.listDates().length,
  });
}

const app = createApp({
  registry,
  clinicName: directory.clinicName,
  rateLimitMaxRequests: env.RATE_LIMIT_MAX_REQUESTS,
});

app.listen(env.PORT, () => {
  logEvent('server.started', { url: `http://localhost:${env.PORT}`, offices: OFFICES_PATH });
});
