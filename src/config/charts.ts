/**
 * Chart color scheme, shared with the dashboard front end
 */
export const CHART_COLORS: Record<string, string> = {
  temperature: '#3B82F6',
  humidity: '#10B981',
  pressure: '#8B5CF6',
  normal: '#10B981',
  warning: '#F59E0B',
  critical: '#EF4444',
};

// Used for any status without an entry above
export const FALLBACK_COLOR = '#6B7280';
