import Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";
import logger from "../utils/logger";
import { withTimeout } from "../utils/async";
import { errorMessage } from "../utils/errors";

// ── Zod Schemas ──────────────────────────────────────────────────────────────

const InsightsResponseSchema = z.object({
  trading_notes: z.array(z.string()).min(1),
  risk_assessment: z.string(),
  execution_recommendations: z.array(z.string()),
  market_context: z.string(),
});

// ── Types ────────────────────────────────────────────────────────────────────

/** Inputs for a narrative. Percent fields are already ×100. */
export interface AssetMetrics {
  asset: string;
  totalReturnPercent: number;
  sharpeRatio: number;
  winRatePercent: number;
  maxDrawdownPercent: number;
  tradingDays: number;
  profitFactor: number;
  currentPrice: number;
  maLong: number;
  maShort: number;
  rsMaShort: number;
  rsMaLong: number;
  atr14: number;
  volatilityPercent: number;
  /** window lengths, for the labels in the prompt */
  maShortWindow: number;
  maLongWindow: number;
}

export interface PortfolioOverview {
  totalStrategies: number;
  profitableStrategies: number;
  avgReturnPercent: number;
  avgSharpe: number;
  avgWinRatePercent: number;
  topPerformers: { asset: string; returnPercent: number }[];
}

export interface AssetInsights {
  asset: string;
  tradingNotes: string[];
  riskAssessment: string;
  executionRecommendations: string[];
  marketContext: string;
}

/** Narrative generator injected into the playbook commands. */
export interface TextInsightProvider {
  readonly name: string;
  summarize(metrics: AssetMetrics): Promise<string>;
  summarizePortfolio(overview: PortfolioOverview): Promise<string>;
}

// ── Rule-based insights ──────────────────────────────────────────────────────

export function fallbackInsights(m: AssetMetrics): AssetInsights {
  const tradingNotes: string[] = [];
  const executionRecommendations: string[] = [];
  let riskAssessment: string;

  if (m.totalReturnPercent > 1000) {
    tradingNotes.push("Exceptional momentum - consider scaling in gradually to manage volatility risk");
    riskAssessment = "High return potential but extreme volatility risk";
  } else if (m.totalReturnPercent > 100) {
    tradingNotes.push("Strong momentum trend - monitor for continuation signals");
    riskAssessment = "High return with moderate volatility";
  } else if (m.totalReturnPercent > 10) {
    tradingNotes.push("Solid performance - suitable for core portfolio allocation");
    riskAssessment = "Moderate risk with good return potential";
  } else {
    tradingNotes.push("Conservative performance - consider for risk management");
    riskAssessment = "Low risk, modest returns";
  }

  if (m.sharpeRatio > 2) {
    tradingNotes.push("Excellent risk-adjusted returns - increase position size");
    executionRecommendations.push("Consider larger position size due to high Sharpe ratio");
  } else if (m.sharpeRatio > 1) {
    tradingNotes.push("Good risk-adjusted performance - maintain current sizing");
    executionRecommendations.push("Standard position sizing appropriate");
  } else {
    tradingNotes.push("Lower risk-adjusted returns - consider reducing position size");
    executionRecommendations.push("Consider smaller position size due to lower Sharpe ratio");
  }

  if (m.winRatePercent > 80) {
    tradingNotes.push("High win rate suggests strong signal quality");
  } else if (m.winRatePercent < 50) {
    tradingNotes.push("Low win rate - review entry criteria and market conditions");
  }

  if (m.maxDrawdownPercent > 20) {
    tradingNotes.push("High drawdown risk - implement strict stop losses");
    executionRecommendations.push("Use tighter stop losses to manage drawdown risk");
  }

  return {
    asset: m.asset,
    tradingNotes,
    riskAssessment,
    executionRecommendations,
    marketContext: "Market analysis unavailable - using fallback metrics",
  };
}

export function formatInsights(ins: AssetInsights): string {
  return [
    ...ins.tradingNotes,
    `Risk: ${ins.riskAssessment}`,
    ...ins.executionRecommendations,
    `Context: ${ins.marketContext}`,
  ].join("; ");
}

export function formatFallbackInsights(ins: AssetInsights): string {
  return (
    `${ins.tradingNotes.join("; ")}; Risk: ${ins.riskAssessment}; ` +
    `Recommendations: ${ins.executionRecommendations.join("; ")}`
  );
}

export function fallbackPortfolioSummary(o: PortfolioOverview): string {
  const successRate = o.totalStrategies > 0 ? (o.profitableStrategies / o.totalStrategies) * 100 : 0;
  return (
    `Portfolio Analysis: ${o.profitableStrategies} profitable strategies out of ${o.totalStrategies} total ` +
    `(${successRate.toFixed(1)}% success rate). Average return: ${o.avgReturnPercent.toFixed(1)}%, ` +
    `Average Sharpe: ${o.avgSharpe.toFixed(2)}, Average win rate: ${o.avgWinRatePercent.toFixed(1)}%.`
  );
}

export class OfflineInsightProvider implements TextInsightProvider {
  readonly name = "offline";

  async summarize(metrics: AssetMetrics): Promise<string> {
    return formatFallbackInsights(fallbackInsights(metrics));
  }

  async summarizePortfolio(overview: PortfolioOverview): Promise<string> {
    return fallbackPortfolioSummary(overview);
  }
}

// ── Claude ───────────────────────────────────────────────────────────────────

/** Strip the markdown code fences Claude sometimes wraps around JSON, then validate. */
export function parseInsightsResponse(asset: string, text: string): AssetInsights {
  const cleaned = text
    .replace(/```(?:json)?\s*/gi, "")
    .replace(/```\s*/g, "")
    .trim();
  if (cleaned.length === 0) throw new Error("empty response");

  const parsed = InsightsResponseSchema.parse(JSON.parse(cleaned));
  return {
    asset,
    tradingNotes: parsed.trading_notes,
    riskAssessment: parsed.risk_assessment,
    executionRecommendations: parsed.execution_recommendations,
    marketContext: parsed.market_context,
  };
}

function assetPrompt(m: AssetMetrics): string {
  const maS = `MA${m.maShortWindow}`;
  const maL = `MA${m.maLongWindow}`;
  return (
    `ASSET: ${m.asset}\n\n` +
    `PERFORMANCE METRICS:\n` +
    `- Total Return: ${m.totalReturnPercent.toFixed(2)}%\n` +
    `- Sharpe Ratio: ${m.sharpeRatio.toFixed(2)}\n` +
    `- Win Rate: ${m.winRatePercent.toFixed(1)}%\n` +
    `- Max Drawdown: ${m.maxDrawdownPercent.toFixed(2)}%\n` +
    `- Trading Days: ${m.tradingDays}\n` +
    `- Profit Factor: ${m.profitFactor.toFixed(2)}\n\n` +
    `CURRENT MARKET DATA:\n` +
    `- Current Price: $${m.currentPrice.toFixed(2)}\n` +
    `- ${maL}: $${m.maLong.toFixed(2)}\n` +
    `- ${maS}: $${m.maShort.toFixed(2)}\n` +
    `- RS vs BTC (${maS}): ${m.rsMaShort.toFixed(3)}\n` +
    `- RS vs BTC (${maL}): ${m.rsMaLong.toFixed(3)}\n` +
    `- ATR(14): $${m.atr14.toFixed(2)}\n` +
    `- Volatility: ${m.volatilityPercent.toFixed(2)}%\n\n` +
    `Provide 3-5 trading notes, a 1-2 sentence risk assessment, 2-3 execution ` +
    `recommendations and a 1-2 sentence market context.\n\n` +
    `Respond with this exact JSON format:\n` +
    `{"trading_notes": ["..."], "risk_assessment": "...", ` +
    `"execution_recommendations": ["..."], "market_context": "..."}`
  );
}

export interface AnthropicInsightOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxRetries?: number;
}

export class AnthropicInsightProvider implements TextInsightProvider {
  readonly name = "anthropic";
  private readonly client: Anthropic;

  constructor(private readonly opts: AnthropicInsightOptions) {
    this.client = new Anthropic({
      apiKey: opts.apiKey,
      timeout: opts.timeoutMs,
      maxRetries: opts.maxRetries ?? 1,
    });
  }

  private async complete(system: string, content: string, maxTokens: number): Promise<string> {
    const message = await this.client.messages.create({
      model: this.opts.model,
      max_tokens: maxTokens,
      system,
      messages: [{ role: "user", content }],
    });

    const textBlock = message.content.find((block) => block.type === "text");
    if (!textBlock || textBlock.type !== "text") {
      throw new Error("no text block in Claude response");
    }
    return textBlock.text;
  }

  async summarize(metrics: AssetMetrics): Promise<string> {
    const text = await this.complete(
      "You are a quantitative analyst specializing in crypto momentum strategies. " +
        "Respond ONLY with a JSON object, no markdown, no code fences.",
      assetPrompt(metrics),
      1000,
    );
    return formatInsights(parseInsightsResponse(metrics.asset, text));
  }

  async summarizePortfolio(o: PortfolioOverview): Promise<string> {
    const top = o.topPerformers
      .slice(0, 5)
      .map((p) => `${p.asset}: ${p.returnPercent.toFixed(1)}%`)
      .join(", ");
    const successRate = o.totalStrategies > 0 ? (o.profitableStrategies / o.totalStrategies) * 100 : 0;

    const text = await this.complete(
      "You are a quantitative portfolio manager specializing in crypto momentum strategies.",
      `PORTFOLIO METRICS:\n` +
        `- Total Strategies: ${o.totalStrategies}\n` +
        `- Profitable Strategies: ${o.profitableStrategies} (${successRate.toFixed(1)}%)\n` +
        `- Average Return (Profitable): ${o.avgReturnPercent.toFixed(1)}%\n` +
        `- Average Sharpe Ratio: ${o.avgSharpe.toFixed(2)}\n` +
        `- Average Win Rate: ${o.avgWinRatePercent.toFixed(1)}%\n\n` +
        `TOP PERFORMERS: ${top}\n\n` +
        `Write a 2-3 paragraph analysis: strategy effectiveness, themes in the top ` +
        `performers, risk management and positioning.`,
      800,
    );
    const trimmed = text.trim();
    if (trimmed.length === 0) throw new Error("empty response");
    return trimmed;
  }
}

// ── Resolution ───────────────────────────────────────────────────────────────

export function createInsightProvider(env: {
  ANTHROPIC_API_KEY?: string;
  INSIGHTS_MODEL: string;
  INSIGHTS_TIMEOUT_MS: number;
}): TextInsightProvider {
  if (!env.ANTHROPIC_API_KEY) {
    logger.info("ANTHROPIC_API_KEY not set; playbook notes use rule-based insights");
    return new OfflineInsightProvider();
  }
  return new AnthropicInsightProvider({
    apiKey: env.ANTHROPIC_API_KEY,
    model: env.INSIGHTS_MODEL,
    timeoutMs: env.INSIGHTS_TIMEOUT_MS,
  });
}

const offline = new OfflineInsightProvider();

/** Provider narrative, or the rule-based text on any failure or timeout. */
export async function summarizeWithFallback(
  provider: TextInsightProvider,
  metrics: AssetMetrics,
  timeoutMs: number,
): Promise<string> {
  try {
    return await withTimeout(provider.summarize(metrics), timeoutMs, `${provider.name} insights`);
  } catch (err) {
    logger.warn(`Insights failed for ${metrics.asset}: ${errorMessage(err)}. Using fallback analysis.`);
    return offline.summarize(metrics);
  }
}

export async function summarizePortfolioWithFallback(
  provider: TextInsightProvider,
  overview: PortfolioOverview,
  timeoutMs: number,
): Promise<string> {
  try {
    return await withTimeout(provider.summarizePortfolio(overview), timeoutMs, `${provider.name} portfolio insights`);
  } catch (err) {
    logger.warn(`Portfolio insights failed: ${errorMessage(err)}. Using fallback analysis.`);
    return offline.summarizePortfolio(overview);
  }
}
