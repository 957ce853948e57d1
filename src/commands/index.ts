import type { Command } from '../types/command.js';
import * as leaderboard from './stats/leaderboard.js';
import * as matchStats from './stats/match-stats.js';
import * as stats from './stats/stats.js';

export const commands: readonly Command[] = [matchStats, leaderboard, stats];
