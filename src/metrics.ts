import { Counter, register } from 'prom-client';

export const commandsTotal = new Counter({ name: 'commands_total', help: 'Bot commands handled' });
export const notificationsSent = new Counter({
  name: 'notifications_sent_total',
  help: 'game notifications delivered',
  labelNames: ['mode']
});
export const checkFailures = new Counter({ name: 'check_failures_total', help: 'per-player checks that threw' });

export { register };
