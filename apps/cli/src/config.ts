export default {
  games: parseInt(process.env.SIM_GAMES || "100", 10),
  seed: process.env.SIM_SEED || "brinksmanship",
  /** Unset means each game draws its own length from the seed */
  maxTurns: process.env.SIM_MAX_TURNS ? parseInt(process.env.SIM_MAX_TURNS, 10) : undefined,
  logLevel: process.env.LOG_LEVEL || "info",
};
