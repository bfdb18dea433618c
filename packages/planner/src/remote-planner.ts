import { NotImplementedError } from "@steadyplan/schemas";
import type { Plan, Planner } from "@steadyplan/schemas";

/**
 * Extension point for a hosted planning agent. Wiring a real service means
 * sending the request to it and mapping the reply onto the plan format
 * (then checking it with `validatePlanData`). Until then every call fails.
 */
export class RemotePlanner implements Planner {
  readonly name = "remote";

  generate(_request: string): Plan {
    throw new NotImplementedError(
      "Remote planning service integration is not implemented. Use the deterministic or baseline planner."
    );
  }
}
