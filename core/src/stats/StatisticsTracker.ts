import { Statistics, StatisticsEvent } from '../types';

function emptyStatistics(): Statistics {
  return {
    sentCount: 0,
    rejectedCount: 0,
    currentBufferBytes: 0,
    peakBufferBytes: 0,
    lastPacketText: '',
    retryCount: 0,
    receivedCount: 0,
    decodeErrorCount: 0,
    connectionErrorCount: 0,
  };
}

export class StatisticsTracker {
  private stats: Statistics = emptyStatistics();

  record(event: StatisticsEvent): void {
    switch (event.type) {
      case 'sent':
        this.stats.sentCount++;
        this.stats.lastPacketText = event.text;
        break;
      case 'rejected':
        this.stats.rejectedCount++;
        break;
      case 'buffer':
        this.stats.currentBufferBytes = event.bytes;
        this.stats.peakBufferBytes = Math.max(this.stats.peakBufferBytes, event.bytes);
        break;
      case 'retry':
        this.stats.retryCount++;
        break;
      case 'received':
        this.stats.receivedCount++;
        break;
      case 'decodeError':
        this.stats.decodeErrorCount++;
        break;
      case 'connectionError':
        this.stats.connectionErrorCount++;
        break;
    }
  }

  // Buffer occupancy and the last packet describe live state and survive a reset.
  reset(): void {
    const { currentBufferBytes, lastPacketText } = this.stats;
    this.stats = { ...emptyStatistics(), currentBufferBytes, lastPacketText };
  }

  snapshot(): Readonly<Statistics> {
    return Object.freeze({ ...this.stats });
  }
}
