import type { APIRoute } from 'astro';
import { taskManager } from '../../lib/tasks/task-manager';
import { processSearchTask } from '../../lib/tasks/task-processor';
import { validateSearchRequest } from '../../lib/types';

export const POST: APIRoute = async ({ request }) => {
  try {
    let body: unknown;
    try {
      body = await request.json();
    } catch {
      return new Response(
        JSON.stringify({ error: 'Request body must be JSON' }),
        { status: 400, headers: { 'Content-Type': 'application/json' } }
      );
    }

    // Reject bad input before a task exists
    const validation = validateSearchRequest(body);
    if (!validation.ok) {
      return new Response(
        JSON.stringify({ error: validation.error }),
        { status: 400, headers: { 'Content-Type': 'application/json' } }
      );
    }

    const taskId = taskManager.createTask();

    // Start processing in background (don't await)
    processSearchTask(taskId, body).catch(err => {
      console.error('Search task error:', err);
      taskManager.failTask(taskId, 'Processing failed');
    });

    return new Response(
      JSON.stringify({ taskId }),
      {
        status: 200,
        headers: { 'Content-Type': 'application/json' }
      }
    );
  } catch (error) {
    console.error('Search endpoint error:', error);
    return new Response(
      JSON.stringify({ error: 'Internal server error' }),
      { status: 500, headers: { 'Content-Type': 'application/json' } }
    );
  }
};
