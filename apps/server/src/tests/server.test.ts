import { test, expect, describe, beforeEach, afterEach, vi } from 'vitest'
import type { FastifyInstance } from 'fastify'
import { buildServer } from '../app.js'
import { loadConfig } from '../config.js'
import { GameService } from '../services/gameService.js'
import type { GameView } from '../types/game.js'

describe('Game HTTP API', () => {
  let server: FastifyInstance
  let gameService: GameService

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    const built = await buildServer({ config: loadConfig({ NODE_ENV: 'test' }), logger: false })
    server = built.fastify
    gameService = built.gameService
    await server.ready()
  })

  afterEach(async () => {
    await server.close()
    vi.restoreAllMocks()
  })

  async function createGame(query = 'player1Name=Alice&player2Name=Bob&humanPlayers=2'): Promise<GameView> {
    const response = await server.inject({ method: 'POST', url: `/games?${query}` })
    expect(response.statusCode).toBe(201)
    return response.json<GameView>()
  }

  async function move(gameId: string, playerId: string, column: number | string) {
    return server.inject({ method: 'POST', url: `/games/${gameId}/moves?playerId=${playerId}&column=${column}` })
  }

  test('GET /health returns 200 and correct response', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' })

    expect(response.statusCode).toBe(200)
    const body = response.json()
    expect(body).toHaveProperty('status', 'ok')
    expect(body).toHaveProperty('games', 0)
    expect(typeof body.uptime).toBe('number')
    expect(new Date(body.timestamp).getTime()).not.toBeNaN()
  })

  test('POST /games creates a game', async () => {
    const game = await createGame()

    expect(game.rows).toBe(6)
    expect(game.columns).toBe(7)
    expect(game.connect).toBe(4)
    expect(game.board).toHaveLength(6)
    expect(game.currentTurn).toBe('P1')
    expect(game.status).toBe('in-progress')
    expect(game.winner).toBe(null)
    expect(game.players.P1).toEqual({ seat: 'P1', name: 'Alice', color: 'red', type: 'human' })
    expect(game.players.P2).toEqual({ seat: 'P2', name: 'Bob', color: 'yellow', type: 'human' })
  })

  test('POST /games defaults to two human players', async () => {
    const game = await createGame('')

    expect(game.players.P1.type).toBe('human')
    expect(game.players.P2.type).toBe('human')
    expect(game.players.P2.name).toBe('Player 2')
  })

  test('POST /games rejects an invalid number of human players', async () => {
    const response = await server.inject({ method: 'POST', url: '/games?humanPlayers=3' })

    expect(response.statusCode).toBe(400)
    expect(response.json().error).toBe('validation_error')
  })

  test('GET /games lists games and GET /games/:gameId returns one', async () => {
    const first = await createGame()
    const second = await createGame()

    const list = await server.inject({ method: 'GET', url: '/games' })
    expect(list.statusCode).toBe(200)
    expect(list.json<GameView[]>().map(game => game.id)).toEqual([first.id, second.id])

    const one = await server.inject({ method: 'GET', url: `/games/${second.id}` })
    expect(one.statusCode).toBe(200)
    expect(one.json<GameView>().id).toBe(second.id)
  })

  test('unknown games answer 404', async () => {
    const response = await server.inject({ method: 'GET', url: '/games/does-not-exist' })

    expect(response.statusCode).toBe(404)
    expect(response.json()).toEqual({ error: 'game_not_found', message: 'Game not found' })

    const moveResponse = await move('does-not-exist', 'P1', 0)
    expect(moveResponse.statusCode).toBe(404)
  })

  test('POST /games/:gameId/moves drops a piece and passes the turn', async () => {
    const game = await createGame()
    const response = await move(game.id, 'P1', 3)

    expect(response.statusCode).toBe(200)
    const body = response.json<GameView>()
    expect(body.board[5][3]).toBe('P1')
    expect(body.currentTurn).toBe('P2')
    expect(body.lastMove).toEqual({ row: 5, column: 3 })
    expect(body.version).toBe(1)
  })

  test('invalid moves answer 400 with a reason', async () => {
    const game = await createGame()

    const wrongTurn = await move(game.id, 'P2', 0)
    expect(wrongTurn.statusCode).toBe(400)
    expect(wrongTurn.json()).toEqual({ error: 'not_your_turn', message: "It's not your turn." })

    const outOfRange = await move(game.id, 'P1', 7)
    expect(outOfRange.statusCode).toBe(400)
    expect(outOfRange.json().error).toBe('invalid_column')

    for (const [index, playerId] of ['P1', 'P2', 'P1', 'P2', 'P1', 'P2'].entries()) {
      const response = await move(game.id, playerId, 0)
      expect(response.statusCode, `drop ${index}`).toBe(200)
    }
    const full = await move(game.id, 'P1', 0)
    expect(full.statusCode).toBe(400)
    expect(full.json()).toEqual({ error: 'column_full', message: 'Column is full.' })
  })

  test('malformed move input answers 400', async () => {
    const game = await createGame()

    const badSeat = await move(game.id, 'P3', 0)
    expect(badSeat.statusCode).toBe(400)
    expect(badSeat.json().error).toBe('validation_error')

    const badColumn = await move(game.id, 'P1', 'left')
    expect(badColumn.statusCode).toBe(400)
    expect(badColumn.json().error).toBe('validation_error')
  })

  test('a win ends the game and later moves are rejected', async () => {
    const game = await createGame()
    const columns = [3, 0, 3, 0, 3, 0, 3]
    let last: GameView | null = null
    for (const [index, column] of columns.entries()) {
      const response = await move(game.id, index % 2 === 0 ? 'P1' : 'P2', column)
      expect(response.statusCode).toBe(200)
      last = response.json<GameView>()
    }

    expect(last?.status).toBe('won')
    expect(last?.winner).toBe('P1')
    expect(last?.winningLine).toHaveLength(4)

    const late = await move(game.id, 'P2', 1)
    expect(late.statusCode).toBe(400)
    expect(late.json().error).toBe('match_finished')
  })

  test('POST /games/:gameId/next_move suggests a column', async () => {
    const game = await createGame()
    const response = await server.inject({ method: 'POST', url: `/games/${game.id}/next_move` })

    expect(response.statusCode).toBe(200)
    expect(response.json()).toEqual({ message: 'Next move calculated.', nextMove: 3 })
  })

  test('POST /games/:gameId/computer_move plays for computer seats only', async () => {
    const computers = await createGame('humanPlayers=0')
    const played = await server.inject({ method: 'POST', url: `/games/${computers.id}/computer_move` })
    expect(played.statusCode).toBe(200)
    expect(played.json<GameView>().board[5][3]).toBe('P1')

    const humans = await createGame()
    const refused = await server.inject({ method: 'POST', url: `/games/${humans.id}/computer_move` })
    expect(refused.statusCode).toBe(400)
    expect(refused.json().error).toBe('not_computer_turn')
  })

  test('POST /games/:gameId/restart resets the board', async () => {
    const game = await createGame()
    await move(game.id, 'P1', 2)

    const response = await server.inject({ method: 'POST', url: `/games/${game.id}/restart` })
    expect(response.statusCode).toBe(200)
    const body = response.json<GameView>()
    expect(body.board[5][2]).toBe(null)
    expect(body.currentTurn).toBe('P1')
    expect(body.version).toBe(0)
  })

  test('POST /games/:gameId/quit removes the game', async () => {
    const game = await createGame()

    const response = await server.inject({ method: 'POST', url: `/games/${game.id}/quit` })
    expect(response.statusCode).toBe(200)
    expect(response.json()).toEqual({ message: 'Game has been quit.', gameId: game.id })

    const after = await server.inject({ method: 'GET', url: `/games/${game.id}` })
    expect(after.statusCode).toBe(404)
  })

  test('POST /games answers 503 once the game limit is reached', async () => {
    const limited = await buildServer({
      config: loadConfig({ NODE_ENV: 'test' }),
      logger: false,
      gameService: new GameService({ maxGames: 1 }),
    })

    const first = await limited.fastify.inject({ method: 'POST', url: '/games' })
    expect(first.statusCode).toBe(201)

    const second = await limited.fastify.inject({ method: 'POST', url: '/games' })
    expect(second.statusCode).toBe(503)
    expect(second.json()).toEqual({
      error: 'game_limit_reached',
      message: 'Too many games in progress, try again later.',
    })
    await limited.fastify.close()
  })

  test('unexpected failures answer 500 without details', async () => {
    vi.spyOn(gameService, 'listGames').mockImplementation(() => {
      throw new Error('store unavailable')
    })

    const response = await server.inject({ method: 'GET', url: '/games' })

    expect(response.statusCode).toBe(500)
    expect(response.json()).toEqual({ error: 'internal_error', message: 'Internal server error' })
  })

  test('GET /debug/games reports store stats outside production', async () => {
    await createGame()
    const response = await server.inject({ method: 'GET', url: '/debug/games' })

    expect(response.statusCode).toBe(200)
    expect(response.json()).toMatchObject({ total: 1, active: 1, finished: 0 })
  })
})
