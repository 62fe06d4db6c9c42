export type Accent = "alert" | "plan";

// Embed colours: blue for scheduled alerts, green for on-demand plans
export const ACCENT_COLORS: Record<Accent, number> = {
  alert: 0x3498db,
  plan: 0x2ecc71,
};

/**
 * Delivers a rendered message to a destination (a chat channel id).
 * Failures reject with NotifierError; there are no retries.
 */
export interface Notifier {
  send(destination: string, title: string, body: string, accent: Accent): Promise<void>;
}
