/*
 Order Service Replay Script
 Replays events from the MongoDB events collection back to RabbitMQ.

 Usage examples:
   npm run replay -- --type=OrderPlaced --orderId=ord_123
   npm run replay -- --from=2025-08-01T00:00:00Z --to=2025-08-10T23:59:59Z

 Filters:
   --type      exact event type (OrderPlaced, OrderCancelled, ...)
   --orderId   payload.orderId equality filter
   --from      occurredAtUtc >= ISO timestamp
   --to        occurredAtUtc <= ISO timestamp
 */

import { closeMongo, connectMongo, ConnectionManager, logger, MessageBus } from 'saga-messaging';
import { config } from '../config';
import { MongoEventsRepo } from '../repositories/eventsRepo';
import { parseReplayArgs, replayEvents } from '../replay/replayEvents';

function usage() {
  // eslint-disable-next-line no-console
  console.log(
    'Replay usage:\n  npm run replay -- [--type=<EventType>] [--orderId=<id>] [--from=<ISO>] [--to=<ISO>]\n'
  );
}

async function main() {
  const args = parseReplayArgs(process.argv.slice(2));
  if (args.help) {
    usage();
    return;
  }
  const { help: _help, ...filter } = args;

  const mongo = await connectMongo(config.MONGO_URL, 'orders');
  const connection = new ConnectionManager(config.RABBITMQ_URL);
  try {
    await connection.start();
    const bus = new MessageBus(connection, config.SERVICE_NAME, config.MQ_BREAKER);
    const summary = await replayEvents(new MongoEventsRepo(mongo.db, config.DB_BREAKER), bus, filter);
    if (summary.failed > 0) process.exitCode = 1;
  } finally {
    await connection.close();
    await closeMongo(mongo);
  }
}

main().catch((err: unknown) => {
  logger.error({ err }, '[Replay] fatal error');
  process.exit(1);
});
