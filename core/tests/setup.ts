// Keep test output readable; set LASERLINK_LOG_LEVEL to debug a failing test.
process.env.LASERLINK_LOG_LEVEL = process.env.LASERLINK_LOG_LEVEL ?? 'silent';
