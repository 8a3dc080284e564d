/**
 * Flowcheck
 *
 * A fluent Given/When/Then DSL for integration tests against HTTP APIs and
 * message brokers. The core package speaks HTTP through `fetch`; broker
 * access comes from an adapter package.
 *
 * For a message broker, install:
 * - @flowcheck/adapter-kafka - Apache Kafka (kafkajs)
 *
 * @example
 * ```typescript
 * import { given } from "flowcheck";
 *
 * const response = await given()
 *   .apiResource("https://api.example.com/products/1")
 *   .withBearerToken("test-token")
 *   .get()
 *   .execute();
 *
 * response.assertStatusCode(200).assertJsonPath("$.name", "Laptop");
 * ```
 */

// Scenario
export * from "./scenario/scenario-engine";
export * from "./scenario/scenario-context";
// Builders
export * from "./builders/step-builder";
export * from "./builders/http.step-builder";
export * from "./builders/messaging.step-builder";
// Steps and results
export * from "./steps/step.types";
export * from "./steps/step.factory";
export * from "./results/result.types";
export * from "./results/result.factory";
// Execution
export * from "./execution/step-executor";
// Validation
export * from "./validation/validation-builder";
export * from "./validation/http.validation";
export * from "./validation/message.validation";
export * from "./validation/batch.validation";
// JSON path
export * from "./json-path/json-path.types";
export * from "./json-path/json-path";
// Authentication
export * from "./auth/auth.types";
export * from "./auth/auth.resolver";
export * from "./auth/http-auth.strategies";
export * from "./auth/messaging-auth.strategies";
export * from "./auth/token-cache";
// Transports
export * from "./http/http.types";
export * from "./http/fetch.transport";
export * from "./messaging/broker.types";
export * from "./messaging/shared-producer";
export * from "./codecs/json.serializer";
// Ambient
export * from "./config/settings";
export * from "./reporting/reporter";
export * from "./errors";
export * from "./utils";
