import { createAssistant } from './app';
import { logger } from './observability/logger';

const DEFAULT_QUESTION = "What's the weather like in Paris today?";

async function main() {
  const assistant = createAssistant();
  const question = process.argv.slice(2).join(' ').trim() || DEFAULT_QUESTION;
  logger.info('question', { model: assistant.config.openaiModel, question });

  const outcome = await assistant.createSession().ask(question);
  if (outcome.toolCall) {
    logger.info('answered with tool', { name: outcome.toolCall.name, result: outcome.toolResult?.content });
  }
  console.log(outcome.answer);
}

main().catch((err) => {
  logger.error('run failed', err);
  process.exit(1);
});
