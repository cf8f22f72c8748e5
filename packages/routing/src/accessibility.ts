import type {
  AccessibilityObstacle,
  AccessibilityRating,
  AccessibilityReport,
  ObstacleSeverity,
  ObstacleType,
  ProviderRoute
} from "./types";

type ObstacleRule = {
  type: ObstacleType;
  severity: ObstacleSeverity;
  keywords: string[];
  warning: string;
  feature: string;
};

export const OBSTACLE_RULES: ObstacleRule[] = [
  {
    type: "stairs",
    severity: "critical",
    keywords: ["stairs", "steps"],
    warning: "Stairs or steps reported along this route",
    feature: "Step-free route"
  },
  {
    type: "steep_slope",
    severity: "high",
    keywords: ["steep", "uphill", "climb"],
    warning: "Be aware of steep inclines on this route",
    feature: "Level terrain"
  },
  {
    type: "narrow_path",
    severity: "medium",
    keywords: ["narrow", "footpath"],
    warning: "Some paths may be too narrow for a wheelchair",
    feature: "Wide sidewalks available"
  }
];

export function detectObstacles(route: Pick<ProviderRoute, "instructions">): AccessibilityObstacle[] {
  const obstacles: AccessibilityObstacle[] = [];
  for (const instruction of route.instructions) {
    const text = instruction.text.toLowerCase();
    for (const rule of OBSTACLE_RULES) {
      if (rule.keywords.some((keyword) => text.includes(keyword))) {
        obstacles.push({
          type: rule.type,
          severity: rule.severity,
          instruction: instruction.text,
          location: instruction.location ?? null
        });
      }
    }
  }
  return obstacles;
}

/**
 * Rates a route for wheelchair use from its instruction text and any obstacles or warnings the
 * provider reported. Walking routes are always rated `good`.
 */
export function assessAccessibility(route: ProviderRoute, wheelchair: boolean): AccessibilityReport {
  if (!wheelchair) {
    return { rating: "good", warnings: [], features: [], obstacles: [] };
  }

  const obstacles = [...(route.obstacles ?? []), ...detectObstacles(route)];
  const present = new Set(obstacles.map((obstacle) => obstacle.type));
  const providerWarnings = route.warnings ?? [];

  let rating: AccessibilityRating = "good";
  if (obstacles.some((obstacle) => obstacle.severity === "critical")) {
    rating = "poor";
  } else if (obstacles.length > 0 || providerWarnings.length > 0) {
    rating = "limited";
  }

  return {
    rating,
    warnings: [
      ...OBSTACLE_RULES.filter((rule) => present.has(rule.type)).map((rule) => rule.warning),
      ...providerWarnings
    ],
    features: OBSTACLE_RULES.filter((rule) => !present.has(rule.type)).map((rule) => rule.feature),
    obstacles
  };
}
