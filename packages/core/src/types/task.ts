/** Sequential integer id issued by the store; never reused once given out */
export type TaskId = number;

export interface Task {
  readonly id: TaskId;
  readonly description: string;
  readonly completed: boolean;
}
