import type { LevelRecord } from "@pushbox/contracts";

export interface FallbackLevel extends LevelRecord {
  readonly name: string;
}

/**
 * Hand-authored levels handed out when generation runs out of attempts.
 * Each carries a known solution.
 */
export const FALLBACK_LEVELS: readonly FallbackLevel[] = [
  {
    name: "first-push",
    text: ["#####", "#@  #", "# $.#", "#   #", "#####"].join("\n"),
    solution: ["D", "R"],
  },
  {
    name: "twin-rows",
    text: ["######", "#    #", "#@$ .#", "# $ .#", "#    #", "######"].join("\n"),
    solution: ["R", "R", "U", "L", "L", "D", "D", "R", "R"],
  },
  {
    name: "long-lanes",
    text: [
      "#######",
      "#     #",
      "#@$  .#",
      "#     #",
      "# $  .#",
      "#     #",
      "#######",
    ].join("\n"),
    solution: ["R", "R", "R", "D", "L", "L", "L", "D", "R", "R", "R"],
  },
  {
    name: "crossroads",
    text: [
      "#######",
      "#  .  #",
      "#  $  #",
      "#.$@$.#",
      "#     #",
      "#     #",
      "#######",
    ].join("\n"),
    solution: ["U", "D", "L", "R", "R"],
  },
  {
    name: "pillar",
    text: [
      "#######",
      "##   ##",
      "#  #  #",
      "# $@$ #",
      "#.   .#",
      "#######",
    ].join("\n"),
    solution: ["L", "U", "L", "D", "R", "R", "R", "U", "R", "D"],
  },
];

/**
 * Terminal fallback, handed out without verification.
 */
export const EMERGENCY_LEVEL: FallbackLevel = {
  name: "emergency",
  text: ["#####", "#@$.#", "#   #", "#####"].join("\n"),
  solution: ["R"],
};
