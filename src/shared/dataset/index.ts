export {
  MancalaExample,
  encodeExample,
  decodeExample,
  formatRecordValue,
  recordLength,
  pitsForRecordLength,
} from './MancalaExample';
export { MancalaDataset } from './MancalaDataset';
