// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/city.js';
export * from './entities/tour.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors/tour-errors.js';

// ─── Services ─────────────────────────────────────────────────────────────────
export * from './services/city-accessor.js';
export * from './services/nearest-neighbor.js';
export * from './services/tour-planner.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/tour-planning.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/city-source.port.js';
export * from './ports/outbound/tour-renderer.port.js';
