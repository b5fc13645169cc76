// src/utility/utility-executors.ts: tool-backed utility answers (weather, time, holidays, feeds, status)

import type { AuditSink } from '@/audit/audit-sink';
import { safeAppend } from '@/audit/audit-sink';
import type { ToolClient } from '@/mcp/tool-client';
import { TOOL_NAMES, callToolWithAlias } from '@/mcp/tool-alias';
import { logger } from '@/services/logger';
import { agentResponse } from '@/search/types';
import type { AgentResponse, ToolCallRecord, UtilityResult } from '@/search/types';
import { isAbortError } from '@/utils/abort';
import {
  buildFeedResponse,
  buildHolidayResponse,
  buildStatusResponse,
  buildTimeBrief,
  buildWeatherBrief,
  parseBestGeocodeCandidate,
} from '@/utility/utility-responses';

const WEATHER_GEOCODE_FAILED =
  'I couldn\'t resolve that location for weather lookup. Try a city and region like "Rexburg, ID".';
const WEATHER_NO_CANDIDATE = "I couldn't find coordinates for that location. Try a more specific place name.";
const WEATHER_FORECAST_FAILED = "I couldn't fetch the weather details right now. Please try again in a moment.";
const WEATHER_NO_SNAPSHOT =
  "I found weather data, but couldn't extract a clean snapshot yet. Try asking again and I'll refresh it.";

const TIME_GEOCODE_FAILED = "I couldn't resolve that location for a timezone lookup.";
const TIME_NO_CANDIDATE = "I couldn't find coordinates for that location. Try a more specific city/country.";
const TIME_ZONE_FAILED = "I couldn't resolve the timezone for that location right now.";

const HOLIDAY_FAILED = "I couldn't fetch holiday data right now. Please try again in a moment.";
const FEED_FAILED = "I couldn't fetch that feed right now.";
const STATUS_FAILED = "I couldn't complete that reachability check right now.";

export interface UtilityExecutorDeps {
  tools: ToolClient;
  audit: AuditSink;
  now?: () => Date;
}

export class UtilityExecutors {
  private readonly now: () => Date;

  constructor(private readonly deps: UtilityExecutorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /** Runs the tool and records it; the record keeps the full result. */
  private async call(
    toolName: string,
    argsJson: string,
    toolCalls: ToolCallRecord[],
    signal?: AbortSignal,
  ): Promise<{ result: string; success: boolean }> {
    const call = await callToolWithAlias(this.deps.tools, toolName, argsJson, signal);
    toolCalls.push({ toolName: call.toolName, arguments: argsJson, result: call.result, success: call.success });
    if (!call.success) logger.warn('utility:tool_failed', { tool: toolName, error: call.result });
    return call;
  }

  private failure(text: string, toolCalls: ToolCallRecord[]): AgentResponse {
    return agentResponse(text, toolCalls, { success: false });
  }

  async weather(
    message: string,
    utility: UtilityResult,
    toolCalls: ToolCallRecord[],
    signal?: AbortSignal,
  ): Promise<AgentResponse> {
    const geocode = await this.call(TOOL_NAMES.weatherGeocode, utility.toolArgs ?? '{}', toolCalls, signal);
    if (!geocode.success) return this.failure(WEATHER_GEOCODE_FAILED, toolCalls);

    const geo = parseBestGeocodeCandidate(geocode.result);
    if (!geo) return agentResponse(WEATHER_NO_CANDIDATE, toolCalls);

    const forecastArgs = JSON.stringify({
      latitude: geo.latitude,
      longitude: geo.longitude,
      placeHint: geo.name,
      countryCode: geo.countryCode,
      days: 7,
    });
    const forecast = await this.call(TOOL_NAMES.weatherForecast, forecastArgs, toolCalls, signal);
    if (!forecast.success) return this.failure(WEATHER_FORECAST_FAILED, toolCalls);

    const brief = buildWeatherBrief(forecast.result, message, geo.name);
    return agentResponse(brief ?? WEATHER_NO_SNAPSHOT, toolCalls);
  }

  async time(
    message: string,
    utility: UtilityResult,
    toolCalls: ToolCallRecord[],
    signal?: AbortSignal,
  ): Promise<AgentResponse> {
    const geocode = await this.call(TOOL_NAMES.weatherGeocode, utility.toolArgs ?? '{}', toolCalls, signal);
    if (!geocode.success) return this.failure(TIME_GEOCODE_FAILED, toolCalls);

    const geo = parseBestGeocodeCandidate(geocode.result);
    if (!geo) return agentResponse(TIME_NO_CANDIDATE, toolCalls);

    const tzArgs = JSON.stringify({ latitude: geo.latitude, longitude: geo.longitude, countryCode: geo.countryCode });
    const tz = await this.call(TOOL_NAMES.resolveTimezone, tzArgs, toolCalls, signal);
    if (!tz.success) return this.failure(TIME_ZONE_FAILED, toolCalls);

    const brief =
      buildTimeBrief(tz.result, geo.name, message, this.now()) ??
      `I found the location for **${geo.name}**, but couldn't build a clean time answer yet.`;
    return agentResponse(brief, toolCalls);
  }

  async holiday(utility: UtilityResult, toolCalls: ToolCallRecord[], signal?: AbortSignal): Promise<AgentResponse> {
    const toolName = utility.toolName ?? TOOL_NAMES.holidaysGet;
    const call = await this.call(toolName, utility.toolArgs ?? '{}', toolCalls, signal);
    if (!call.success) return this.failure(HOLIDAY_FAILED, toolCalls);
    return agentResponse(buildHolidayResponse(toolName, call.result, this.now()), toolCalls);
  }

  async feed(utility: UtilityResult, toolCalls: ToolCallRecord[], signal?: AbortSignal): Promise<AgentResponse> {
    const call = await this.call(utility.toolName ?? TOOL_NAMES.feedFetch, utility.toolArgs ?? '{}', toolCalls, signal);
    if (!call.success) return this.failure(FEED_FAILED, toolCalls);
    return agentResponse(buildFeedResponse(call.result), toolCalls);
  }

  async status(utility: UtilityResult, toolCalls: ToolCallRecord[], signal?: AbortSignal): Promise<AgentResponse> {
    const call = await this.call(
      utility.toolName ?? TOOL_NAMES.statusCheckUrl,
      utility.toolArgs ?? '{}',
      toolCalls,
      signal,
    );
    if (!call.success) return this.failure(STATUS_FAILED, toolCalls);
    return agentResponse(buildStatusResponse(call.result), toolCalls);
  }

  /**
   * Any other tool-carrying result: run it for the record and let the caller
   * continue. A failed call is logged and audited, not surfaced.
   */
  async generic(utility: UtilityResult, toolCalls: ToolCallRecord[], signal?: AbortSignal): Promise<void> {
    if (!utility.toolName || !utility.toolArgs) return;
    try {
      const result = await this.deps.tools.callOperation(utility.toolName, utility.toolArgs, signal);
      toolCalls.push({ toolName: utility.toolName, arguments: utility.toolArgs, result, success: true });
    } catch (err) {
      if (isAbortError(err)) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn('utility:generic_tool_failed', { tool: utility.toolName, error: reason });
      safeAppend(this.deps.audit, { action: 'UTILITY_TOOL_FAILED', result: reason, details: { tool: utility.toolName } });
    }
  }
}
