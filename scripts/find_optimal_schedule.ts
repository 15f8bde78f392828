import dotenv from 'dotenv';
import path from 'path';
import { runOptimizer } from '../src/cli/optimize';

// Usage: npx tsx scripts/find_optimal_schedule.ts [path_to_config.json]
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

process.exitCode = runOptimizer({ configPath: process.argv[2] });
