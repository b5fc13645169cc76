/**
 * Tool names show up in two casings at the server boundary (web_search / WebSearch).
 * Every call goes primary first, then the alternate, through this one helper.
 */
import type { ToolClient } from '@/mcp/tool-client';
import { UNKNOWN_TOOL_PATTERN } from '@/mcp/tool-client';
import { isAbortError } from '@/utils/abort';

export const TOOL_NAMES = {
  webSearch: 'web_search',
  browserNavigate: 'browser_navigate',
  weatherGeocode: 'weather_geocode',
  weatherForecast: 'weather_forecast',
  resolveTimezone: 'resolve_timezone',
  holidaysGet: 'holidays_get',
  holidaysNext: 'holidays_next',
  holidaysIsToday: 'holidays_is_today',
  feedFetch: 'feed_fetch',
  statusCheckUrl: 'status_check_url',
} as const;

export type KnownToolName = (typeof TOOL_NAMES)[keyof typeof TOOL_NAMES];

export interface AliasedToolResult {
  toolName: string;
  result: string;
  success: boolean;
}

/** web_search -> WebSearch */
export function toPascalCaseToolAlias(toolName: string): string {
  const alias = toolName
    .split('_')
    .filter((part) => part.length > 0)
    .map((part) => part[0].toUpperCase() + part.slice(1))
    .join('');
  return alias || toolName;
}

export function isUnknownToolResult(result: string, toolName: string): boolean {
  if (!UNKNOWN_TOOL_PATTERN.test(result)) return false;
  return result.toLowerCase().includes(toolName.toLowerCase()) || result.trim().length < 200;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function callToolWithAlias(
  client: ToolClient,
  primaryName: string,
  argsJson: string,
  signal?: AbortSignal,
  alternateName: string = toPascalCaseToolAlias(primaryName),
): Promise<AliasedToolResult> {
  let primaryFailure: string;

  try {
    const result = await client.callOperation(primaryName, argsJson, signal);
    if (!isUnknownToolResult(result, primaryName)) {
      return { toolName: primaryName, result, success: true };
    }
    primaryFailure = result;
  } catch (err) {
    if (isAbortError(err)) throw err;
    primaryFailure = messageOf(err);
  }

  if (alternateName === primaryName) {
    return { toolName: primaryName, result: `Error: ${primaryFailure}`, success: false };
  }

  try {
    const result = await client.callOperation(alternateName, argsJson, signal);
    return { toolName: alternateName, result, success: true };
  } catch (err) {
    if (isAbortError(err)) throw err;
    return {
      toolName: primaryName,
      result: `Error: ${primaryFailure}; fallback failed: ${messageOf(err)}`,
      success: false,
    };
  }
}
