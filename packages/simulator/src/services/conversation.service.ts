import { TurnRole, type GroundTruth, type Turn } from '@student-sim/shared';
import type { ModelCapability } from './llm.service.js';
import { buildSimulationSystemPrompt } from '../prompts/simulation/system.prompt.js';
import { buildFeedbackMessage, buildProblemMessage } from '../prompts/simulation/user.prompt.js';
import { SessionStateError } from '../utils/errors.js';

export enum SessionState {
  AWAITING_PROBLEM = 'awaiting_problem',
  AWAITING_FEEDBACK_ACK = 'awaiting_feedback_ack',
}

/**
 * One student's conversation with the model.
 *
 * The transcript starts with the system turn and only ever grows:
 *   pose()     appends the problem and the model's reply
 *   feedback() appends the ground-truth turn, which the model first sees
 *              as context on the next pose()
 *
 * A session belongs to exactly one student and is discarded afterwards.
 */
export class ConversationSession {
  private readonly turns: Turn[];
  private currentState = SessionState.AWAITING_PROBLEM;

  constructor(
    private readonly model: ModelCapability,
    systemPrompt: string = buildSimulationSystemPrompt(),
  ) {
    this.turns = [{ role: TurnRole.SYSTEM, text: systemPrompt }];
  }

  get state(): SessionState {
    return this.currentState;
  }

  get transcript(): readonly Turn[] {
    return [...this.turns];
  }

  /**
   * Poses a problem and returns the model's raw reply.
   * If the model call throws, the transcript and state are left untouched.
   */
  async pose(problemText: string): Promise<string> {
    if (this.currentState !== SessionState.AWAITING_PROBLEM) {
      throw new SessionStateError('Cannot pose a problem before feedback for the previous one', {
        state: this.currentState,
      });
    }

    const problemTurn: Turn = { role: TurnRole.USER, text: buildProblemMessage(problemText) };
    const reply = await this.model.generate([...this.turns, problemTurn]);

    this.turns.push(problemTurn, { role: TurnRole.MODEL, text: reply });
    this.currentState = SessionState.AWAITING_FEEDBACK_ACK;
    return reply;
  }

  feedback(truth: GroundTruth): void {
    if (this.currentState !== SessionState.AWAITING_FEEDBACK_ACK) {
      throw new SessionStateError('Feedback requires a posed problem', {
        state: this.currentState,
      });
    }

    this.turns.push({ role: TurnRole.USER, text: buildFeedbackMessage(truth) });
    this.currentState = SessionState.AWAITING_PROBLEM;
  }
}
