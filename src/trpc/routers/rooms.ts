import { z } from 'zod/v4';
import { router, protectedProcedure } from '../init.js';
import { ROOM_TYPES } from '../../db/schema/index.js';
import { pageInput } from './pagination.js';

export const createRoomInput = z.object({
  type: z.enum(ROOM_TYPES),
  name: z.string().max(200).nullable().optional(),
  description: z.string().max(2000).nullable().optional(),
  // Bot users carry fixed, non-random ids
  member_ids: z.array(z.guid()).max(500).default([]),
  channel_id: z.string().uuid().nullable().optional(),
});

export const roomRefInput = z.object({ room_id: z.string().uuid() });

export const roomsRouter = router({
  create: protectedProcedure
    .input(createRoomInput)
    .mutation(async ({ ctx, input }) => {
      return ctx.services.rooms.createRoom(ctx.user.id, {
        type: input.type,
        name: input.name,
        description: input.description,
        memberIds: input.member_ids,
        channelId: input.channel_id,
      });
    }),

  list: protectedProcedure.input(pageInput).query(async ({ ctx, input }) => {
    return ctx.services.rooms.listRooms(ctx.user.id, input.page, input.page_size);
  }),

  get: protectedProcedure.input(roomRefInput).query(async ({ ctx, input }) => {
    return ctx.services.rooms.getRoom(input.room_id, ctx.user.id);
  }),

  update: protectedProcedure
    .input(
      z.object({
        room_id: z.string().uuid(),
        name: z.string().min(1).max(200).optional(),
        description: z.string().max(2000).nullable().optional(),
      }),
    )
    .mutation(async ({ ctx, input }) => {
      return ctx.services.rooms.updateRoom(input.room_id, ctx.user.id, {
        name: input.name,
        description: input.description,
      });
    }),

  addMember: protectedProcedure
    .input(z.object({ room_id: z.string().uuid(), user_id: z.guid() }))
    .mutation(async ({ ctx, input }) => {
      return ctx.services.rooms.addMember(input.room_id, ctx.user.id, input.user_id);
    }),

  removeMember: protectedProcedure
    .input(z.object({ room_id: z.string().uuid(), user_id: z.guid() }))
    .mutation(async ({ ctx, input }) => {
      return ctx.services.rooms.removeMember(input.room_id, ctx.user.id, input.user_id);
    }),

  memberCandidates: protectedProcedure
    .input(pageInput.extend({ room_id: z.string().uuid(), search: z.string().max(100).optional() }))
    .query(async ({ ctx, input }) => {
      return ctx.services.rooms.listMemberCandidates(input.room_id, ctx.user.id, input.search, input.page, input.page_size);
    }),

  delete: protectedProcedure.input(roomRefInput).mutation(async ({ ctx, input }) => {
    return ctx.services.rooms.deleteTopic(input.room_id, ctx.user.id);
  }),
});
