/**
 * Route Aggregator
 * Combines all route modules and mounts them under /api/v1
 *
 * ROUTE MODULES:
 * --------------
 * | Module | Path  | Description                              |
 * |--------|-------|------------------------------------------|
 * | logs   | /logs | Dashcam log upload, GPX conversion, info |
 */

import { Router } from "express";
import logsRoutes from "./logs.routes.js";

const router = Router();

// Mount route modules
router.use("/logs", logsRoutes);

export default router;
