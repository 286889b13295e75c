export { JsonlEventWriter, NullEventWriter } from './jsonl-event-writer';
