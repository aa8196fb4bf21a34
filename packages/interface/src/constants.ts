// Interface engine defaults

// Text
export const DEFAULT_FONT_SIZE = 14;

// Bars and rings
export const DEFAULT_BAR_WIDTH = 2;

// Palette keys used when an element does not name its own colors
export const THEME_COLORS = {
  active: "active",
  inactive: "inactive",
  hover: "hover",
  bright: "bright",
  medium: "medium",
} as const;
