import twilio from 'twilio';
import { CandidateBet } from '../types/markets';
import { americanOddsFromProbability } from '../lib/odds';
import { errorMessage } from '../lib/errors';

export interface SmsSettings {
  accountSid: string;
  authToken: string;
  fromNumber: string;
  alertToNumber: string;
}

export class NotificationService {
  private client: twilio.Twilio;

  constructor(private readonly settings: SmsSettings) {
    this.client = twilio(settings.accountSid, settings.authToken);
  }

  /**
   * Send SMS alert with the ranked bets (best first)
   */
  async sendBetAlert(bets: readonly CandidateBet[], maxListed = 3): Promise<void> {
    if (bets.length === 0) {
      console.log('No qualifying bets, skipping SMS alert');
      return;
    }

    const message = formatBetMessage(bets, maxListed);

    try {
      const result = await this.client.messages.create({
        body: message,
        from: this.settings.fromNumber,
        to: this.settings.alertToNumber,
      });

      console.log(`SMS alert sent successfully. SID: ${result.sid}`);
    } catch (error: unknown) {
      throw new Error(`Failed to send SMS alert: ${errorMessage(error)}`);
    }
  }
}

/**
 * Format ranked bets into an SMS body
 */
export function formatBetMessage(bets: readonly CandidateBet[], maxListed = 3): string {
  let message = `🏆 Bet of the day (${bets.length} qualifying)\n\n`;

  for (const bet of bets.slice(0, maxListed)) {
    const american = americanOddsFromProbability(1 / bet.dkPrice);
    const oddsSign = american > 0 ? '+' : '';

    message += `${bet.selection} [${bet.eventId}]\n`;
    message += `  Odds: ${bet.dkPrice.toFixed(2)} (${oddsSign}${american})\n`;
    message += `  Model: ${(bet.modelProb * 100).toFixed(1)}%\n`;
    message += `  Edge: ${(bet.evPercent * 100).toFixed(1)}%\n`;
    message += `  Stake: $${bet.stake.toFixed(2)}\n\n`;
  }

  return message.trim();
}
