// tests/setup.ts
process.env.NODE_ENV = "test";
process.env.JWT_SECRET = "test-secret";
process.env.JWT_REFRESH_SECRET = "test-refresh-secret";
process.env.BCRYPT_ROUNDS = "4";
process.env.TAX_RATE = "15";
process.env.DEFAULT_CURRENCY = "ZAR";
