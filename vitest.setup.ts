// Keep solver debug output out of test runs unless asked for
process.env.LOG_LEVEL ||= "warn";
