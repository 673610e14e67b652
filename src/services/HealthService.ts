import type { StreamSession } from "./StreamSession";
import type { SubscriptionRegistry } from "./SubscriptionRegistry";
import type { VICascadeController } from "./VICascadeController";
import type { OrderEventMonitor } from "./OrderEventMonitor";
import type { Clock } from "../utils/clock";
import { systemClock } from "../utils/clock";
import logger from "../utils/logger";

/**
 * Health status for a single component
 */
export interface ComponentHealth {
    name: string;
    status: "healthy" | "degraded" | "unhealthy";
    message?: string;
    lastUpdated?: Date;
}

/**
 * Overall process health status
 */
export interface SystemHealth {
    status: "healthy" | "degraded" | "unhealthy";
    timestamp: Date;
    uptime: number; // seconds
    memory: {
        used: number; // MB
        total: number; // MB
        percentUsed: number;
    };
    components: ComponentHealth[];
}

export interface HealthServiceDependencies {
    session: StreamSession;
    registry: SubscriptionRegistry;
    viController: VICascadeController;
    orderMonitor?: OrderEventMonitor;
    clock?: Clock;
}

/**
 * Aggregates health of the stream stack
 */
export class HealthService {
    private readonly dependencies: HealthServiceDependencies;
    private readonly clock: Clock;
    private readonly startedAt: number;

    constructor(dependencies: HealthServiceDependencies) {
        this.dependencies = dependencies;
        this.clock = dependencies.clock ?? systemClock;
        this.startedAt = this.clock.now();
    }

    getHealth(): SystemHealth {
        const components: ComponentHealth[] = [
            this.checkSessionHealth(),
            this.checkRegistryHealth(),
            this.checkVIHealth(),
            this.checkOrderMonitorHealth(),
        ];

        const memoryUsage = process.memoryUsage();
        const usedMB = Math.round(memoryUsage.heapUsed / 1024 / 1024);
        const totalMB = Math.round(memoryUsage.heapTotal / 1024 / 1024);

        return {
            status: this.determineOverallStatus(components),
            timestamp: new Date(this.clock.now()),
            uptime: this.getUptime(),
            memory: {
                used: usedMB,
                total: totalMB,
                percentUsed: totalMB > 0 ? Math.round((usedMB / totalMB) * 100 * 10) / 10 : 0,
            },
            components,
        };
    }

    /**
     * Connected is healthy; connecting or backing off is degraded; closed or exhausted is unhealthy
     */
    private checkSessionHealth(): ComponentHealth {
        try {
            const stats = this.dependencies.session.getStats();
            let status: ComponentHealth["status"];
            switch (stats.state) {
                case "connected":
                    status = "healthy";
                    break;
                case "connecting":
                case "error":
                    status = "degraded";
                    break;
                default:
                    status = "unhealthy";
            }

            const retry = stats.reconnectAttempt > 0 ? `, retry ${stats.reconnectAttempt}` : "";
            return {
                name: "session",
                status,
                message: `${stats.state} (${stats.connectCount} connects${retry})`,
                lastUpdated: new Date(this.clock.now()),
            };
        } catch (error) {
            logger.error({ err: error }, "Failed to check session status");
            return {
                name: "session",
                status: "unhealthy",
                message: "Failed to check session status",
                lastUpdated: new Date(this.clock.now()),
            };
        }
    }

    private checkRegistryHealth(): ComponentHealth {
        const registry = this.dependencies.registry;
        const count = registry.getSubscriptions().length;
        const dropped = registry.getDroppedMessageCount();

        return {
            name: "subscriptions",
            status: dropped > 0 ? "degraded" : "healthy",
            message: dropped > 0 ? `${count} active, ${dropped} inbound messages dropped` : `${count} active`,
            lastUpdated: new Date(this.clock.now()),
        };
    }

    private checkVIHealth(): ComponentHealth {
        const controller = this.dependencies.viController;
        const active = controller.getActiveSymbols().size;
        const pending = controller.getPendingUnsubscribes().length;

        return {
            name: "viCascade",
            status: "healthy",
            message: `${active} symbols under VI, ${pending} pending unsubscribes`,
            lastUpdated: new Date(this.clock.now()),
        };
    }

    private checkOrderMonitorHealth(): ComponentHealth {
        const monitor = this.dependencies.orderMonitor;
        if (!monitor) {
            return {
                name: "orders",
                status: "healthy",
                message: "Not configured",
                lastUpdated: new Date(this.clock.now()),
            };
        }

        return {
            name: "orders",
            status: "healthy",
            message: `Tracking ${monitor.getOrders().length} orders`,
            lastUpdated: new Date(this.clock.now()),
        };
    }

    private determineOverallStatus(components: ComponentHealth[]): SystemHealth["status"] {
        if (components.some((c) => c.status === "unhealthy")) {
            return "unhealthy";
        }
        if (components.some((c) => c.status === "degraded")) {
            return "degraded";
        }
        return "healthy";
    }

    /**
     * Seconds since the service was built
     */
    getUptime(): number {
        return Math.floor((this.clock.now() - this.startedAt) / 1000);
    }
}

export default HealthService;
