// Load environment variables FIRST (before any other imports that might need them)
import "dotenv/config";

import express, { Application, Request, Response } from "express";
import cors from "cors";
import routes from "./routes/index.js";
import { API, DEFAULT_TIME_ZONE, ERROR_CODES, FRONTEND_URL } from "./config/constants.js";

// Initialize Express app
const app: Application = express();
const PORT = process.env.PORT || 3000;

// Middleware
app.use(
  cors({
    origin: FRONTEND_URL,
  })
);
app.use(express.json());
app.use(express.urlencoded({ extended: true }));

// API Routes
app.use(API.PREFIX, routes);

// Health check route
app.get("/health", (req: Request, res: Response) => {
  res.json({
    status: "healthy",
    timestamp: new Date().toISOString(),
    environment: process.env.NODE_ENV,
  });
});

// Root route
app.get("/", (req: Request, res: Response) => {
  res.json({
    message: "Dashcam log to GPX converter",
    version: "1.0.0",
    timeZone: DEFAULT_TIME_ZONE,
    endpoints: {
      health: "/health",
      convert: `${API.PREFIX}/logs/convert`,
      convertGpx: `${API.PREFIX}/logs/convert/gpx`,
      info: `${API.PREFIX}/logs/info`,
    },
  });
});

// 404 handler
app.use((req: Request, res: Response) => {
  res.status(404).json({
    success: false,
    error: "Route not found",
    code: ERROR_CODES.NOT_FOUND,
    path: req.path,
  });
});

// Start server
app.listen(PORT, () => {
  console.log("🚀 Server is running!");
  console.log(`📍 Port: ${PORT}`);
  console.log(`🌍 Environment: ${process.env.NODE_ENV}`);
  console.log(`🕒 Time zone: ${DEFAULT_TIME_ZONE}`);
  console.log(`🔗 URL: http://localhost:${PORT}`);
  console.log("✅ Press CTRL+C to stop\n");
});

export default app;
