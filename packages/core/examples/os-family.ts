/**
 * Example: OS Family Queries
 *
 * This example demonstrates how to classify the host and how to evaluate
 * conditions against a synthetic environment.
 */

import {
  OsDetector,
  OsQuery,
  FAMILY_UNIX,
  FAMILY_WINDOWS,
  createSnapshot,
  tryMatches,
} from "../src/index.js";

function main(): void {
  console.log("=== OS Family Example ===\n");

  // Inspect the host
  console.log("1. Detecting the local environment...");
  const report = OsDetector.describe();
  console.log(`   Name: ${report.snapshot.name}`);
  console.log(`   Architecture: ${report.snapshot.arch}`);
  console.log(`   Version: ${report.snapshot.version}`);
  console.log(`   Family: ${report.family ?? "unsupported"}`);
  console.log(`   Matching families: ${report.families.join(", ")}`);
  console.log();

  // Single-criterion checks
  console.log("2. Checking families...");
  console.log(`   Is Windows? ${OsDetector.isFamily(FAMILY_WINDOWS)}`);
  console.log(`   Is Unix? ${OsDetector.isFamily(FAMILY_UNIX)}`);
  console.log();

  // Evaluate a condition for another platform
  console.log("3. Evaluating a condition for a z/OS target...");
  const zos = createSnapshot({ name: "z/OS", arch: "s390x", version: "02.05.00", pathSeparator: ":" });
  const query = new OsQuery(FAMILY_UNIX).setArch("s390x");
  console.log(`   unix on s390x? ${query.evaluate(zos)}`);
  console.log(`   families: ${OsDetector.describe(zos).families.join(", ")}`);
  console.log();

  // Untrusted tokens
  console.log("4. Checking a family name from configuration...");
  const result = tryMatches({ family: "beos" }, zos);
  if (result.success) {
    console.log(`   Match: ${result.data}`);
  } else {
    console.log(`   Rejected: ${result.error.message}`);
  }
}

main();
