// keep test output quiet unless a test raises the level itself
process.env.OBS_LOG_LEVEL ??= 'error';
