/**
 * Next.js instrumentation: runs once when the server starts. Starts the
 * event system (bus + outbox worker) and registers the expense consumers.
 */
export async function register() {
  if (process.env.NEXT_RUNTIME === 'nodejs') {
    const { initializeEventSystem, getEventBus, getAppConfig, logger, setLogLevel } = await import('@expensox/core');
    const { registerExpenseConsumers } = await import('@expensox/module-expenses');

    setLogLevel(getAppConfig().logLevel);
    registerExpenseConsumers(getEventBus());
    await initializeEventSystem();
    logger.info('Instrumentation complete', { consumers: ['expenses'] });
  }
}
